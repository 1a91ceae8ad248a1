/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  Issue,
  IssueType,
  DownloadIssueReason,
  InvocationIssueReason,
  ResourceIssueReason,
  InvocationResult,
  ProcessingStats,
} from "../types";

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => (e.path.length > 0 ? `${e.path.map(String).join(".")}: ${e.message}` : e.message))
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

function mapDownloadError(
  error: unknown,
  context: "fetch" | "write",
): IssueInfo<DownloadIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (context === "write") {
    return { reason: "write-error", details };
  }
  if (error instanceof Error) {
    if (error.name === "AbortError") {
      return { reason: "timeout", details };
    }
    if (error.message.startsWith("HTTP ")) {
      return { reason: "invalid-response", details };
    }
  }
  return { reason: "download-failed", details };
}

function mapInvocation(
  result: InvocationResult,
): IssueInfo<InvocationIssueReason> {
  if (result.error) {
    return { reason: "spawn-error", details: result.error.message };
  }
  if (result.signal) {
    return { reason: "signal", details: `killed by ${result.signal}` };
  }
  return { reason: "exit-code", details: `exited with code ${result.exitCode}` };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private successfulFiles = 0;
  private failedFiles = 0;
  private skippedFiles = 0;
  private plannedFiles = 0;
  private downloadedScripts = 0;
  private failedScripts = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementSuccessful(): void {
    this.successfulFiles++;
  }

  incrementSkipped(): void {
    this.skippedFiles++;
  }

  incrementPlanned(): void {
    this.plannedFiles++;
  }

  incrementScriptsDownloaded(): void {
    this.downloadedScripts++;
  }

  incrementScriptsFailed(): void {
    this.failedScripts++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Record an invocation that did not exit cleanly.
   * Counts the file as failed.
   */
  trackInvocation(result: InvocationResult): void {
    const { reason, details } = mapInvocation(result);
    this.issues.push({ type: "invocation", path: result.inputPath, reason, details });
    this.failedFiles++;
  }

  trackError(path: string, error: unknown, type: "resource"): void;
  trackError(
    path: string,
    error: unknown,
    type: "download",
    context?: "fetch" | "write",
  ): void;
  trackError(
    path: string,
    error: unknown,
    type: "download" | "resource",
    context: "fetch" | "write" = "fetch",
  ): void {
    switch (type) {
      case "download": {
        const { reason, details } = mapDownloadError(error, context);
        this.issues.push({ type: "download", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  trackIssue(issue: Issue): void {
    this.issues.push(issue);
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      successfulFiles: this.successfulFiles,
      failedFiles: this.failedFiles,
      skippedFiles: this.skippedFiles,
      plannedFiles: this.plannedFiles,
      downloadedScripts: this.downloadedScripts,
      failedScripts: this.failedScripts,
      issues: this.issues,
      duration,
    };
  }
}
