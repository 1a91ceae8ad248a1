/**
 * Stats Module
 * Displays run statistics and issues at the end of a batch or update
 */

import chalk from "chalk";
import type {
  Tracker,
  ProcessingStats,
  PipelineContext,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Display run statistics to console
 */
export function stats(ctx: PipelineContext, title: string): void {
  const { tracker, verbose, aborted } = ctx;
  const stats = tracker.getStats();
  const hasErrors = stats.failedFiles > 0 || stats.failedScripts > 0;
  const hasWarnings = stats.issues.length > 0;

  console.log("");

  const statusIcon = aborted || hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");
  const status = aborted ? "Stopped" : "Complete";

  console.log(
    `  ${statusIcon} ${chalk.bold(`${title} ${status}`)} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  displayScriptsSection(stats);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  if (stats.totalFiles === 0) {
    return;
  }

  console.log(sectionHeader("Files"));

  const processable = stats.totalFiles - stats.skippedFiles;
  const done = stats.plannedFiles > 0 ? stats.plannedFiles : stats.successfulFiles;
  console.log(`   ${progressBar(done, processable)}`);

  if (stats.plannedFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Planned", stats.plannedFiles, chalk.cyan),
    );
  } else {
    console.log(
      statRow(chalk.green("◉"), "Processed", stats.successfulFiles, chalk.green),
    );
  }

  if (stats.failedFiles > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red));
  }

  if (stats.skippedFiles > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Skipped", stats.skippedFiles, chalk.yellow),
    );
  }
}

function displayScriptsSection(stats: ProcessingStats): void {
  const totalScripts = stats.downloadedScripts + stats.failedScripts;
  if (totalScripts === 0) {
    return;
  }

  console.log(sectionHeader("Scripts"));
  console.log(`   ${progressBar(stats.downloadedScripts, totalScripts)}`);

  console.log(
    statRow(chalk.green("◉"), "Downloaded", stats.downloadedScripts, chalk.green),
  );

  if (stats.failedScripts > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failedScripts, chalk.red));
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const invocationIssues = tracker.getIssues("invocation");
  const downloadIssues = tracker.getIssues("download");
  const resourceIssues = tracker.getIssues("resource");

  const hasIssues =
    invocationIssues.length > 0 ||
    downloadIssues.length > 0 ||
    resourceIssues.length > 0;

  if (!hasIssues) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (invocationIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Commands failed", invocationIssues.length, chalk.red),
    );
    // Listed even without --verbose
    for (const issue of invocationIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }

  if (downloadIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Downloads failed", downloadIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of downloadIssues.slice(0, 5)) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      }
      if (downloadIssues.length > 5) {
        console.log(`      ${chalk.dim(`  +${downloadIssues.length - 5} more`)}`);
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    for (const issue of resourceIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      if (verbose && issue.details) {
        console.log(`        ${chalk.dim(issue.details)}`);
      }
    }
  }
}
