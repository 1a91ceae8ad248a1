/**
 * Validator Module
 * Turns raw job options into an immutable JobConfig, or fails with ConfigError
 */

import { mkdir, stat } from "fs/promises";
import type { Stats } from "node:fs";
import path from "node:path";
import {
  ConfigError,
  isDirectory,
  isReadable,
  parseFormatFilter,
  tokenizeCommand,
} from "../utils";
import type { BatchContext, JobConfig, JobOptions } from "../types";

function parseCommand(command: string | undefined): string[] {
  const trimmed = command?.trim();
  if (!trimmed) {
    throw new ConfigError(
      "No command specified: pass the script and its options with -c",
      "command",
    );
  }
  if (trimmed.startsWith("-")) {
    throw new ConfigError(
      `Invalid command "${trimmed}": a command cannot begin with "-"`,
      "command",
    );
  }

  const tokens = tokenizeCommand(trimmed);
  if (tokens.length === 0 || tokens[0] === "") {
    throw new ConfigError(`Invalid command "${trimmed}": no program to run`, "command");
  }
  return tokens;
}

function parseSuffix(suffix: string | undefined): string | null {
  if (suffix === undefined) return null;

  const normalized = suffix.trim().replace(/^\./, "");
  if (normalized === "") return null;

  if (/[\\/]/.test(normalized)) {
    throw new ConfigError(
      `Invalid suffix "${suffix}": must be a file extension, not a path`,
      "suffix",
    );
  }
  return normalized;
}

async function resolveInputFolder(folder: string): Promise<void> {
  let info: Stats;
  try {
    info = await stat(folder);
  } catch {
    throw new ConfigError(`Input folder "${folder}" does not exist`, "inputfolder");
  }
  if (!info.isDirectory()) {
    throw new ConfigError(`Input folder "${folder}" is not a directory`, "inputfolder");
  }
  if (!(await isReadable(folder))) {
    throw new ConfigError(`Input folder "${folder}" is not readable`, "inputfolder");
  }
}

async function resolveToolPath(toolPath: string): Promise<void> {
  if (!(await isDirectory(toolPath))) {
    throw new ConfigError(
      `Image tool path "${toolPath}" is not an existing directory`,
      "path2imagemagick",
    );
  }
}

/**
 * Create the output folder when missing; an existing one must be a readable directory
 */
async function prepareOutputFolder(folder: string): Promise<void> {
  let info: Stats | undefined;
  try {
    info = await stat(folder);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
      throw new ConfigError(`Cannot access output folder "${folder}"`, "outputfolder");
    }
  }

  if (info) {
    if (!info.isDirectory()) {
      throw new ConfigError(`Output folder "${folder}" is not a directory`, "outputfolder");
    }
    if (!(await isReadable(folder))) {
      throw new ConfigError(`Output folder "${folder}" is not readable`, "outputfolder");
    }
    return;
  }

  try {
    await mkdir(folder, { recursive: true });
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      `Unable to create output folder "${folder}": ${details}`,
      "outputfolder",
    );
  }
}

function requireNonEmpty(value: string | undefined, option: string, label: string): void {
  if (value !== undefined && value.trim() === "") {
    throw new ConfigError(`${label} path is empty`, option);
  }
}

/**
 * Validate raw options and build the job configuration
 *
 * Relative folders resolve against `cwd`. The output folder is created only
 * after every other check has passed, so a rejected job touches nothing.
 */
export async function resolveJob(
  options: JobOptions,
  cwd: string = process.cwd(),
): Promise<JobConfig> {
  const commandTemplate = parseCommand(options.command);

  requireNonEmpty(options.inputFolder, "inputfolder", "Input folder");
  requireNonEmpty(options.outputFolder, "outputfolder", "Output folder");

  const inputFolder = path.resolve(cwd, options.inputFolder ?? ".");
  await resolveInputFolder(inputFolder);

  const suffix = parseSuffix(options.suffix);

  const toolPath = options.toolPath ? path.resolve(cwd, options.toolPath) : null;
  if (toolPath) {
    await resolveToolPath(toolPath);
  }

  const outputFolder = options.outputFolder
    ? path.resolve(cwd, options.outputFolder)
    : inputFolder;
  await prepareOutputFolder(outputFolder);

  return {
    commandTemplate,
    inputFolder,
    outputFolder,
    formatFilter: parseFormatFilter(options.format),
    suffix,
    toolPath,
    failurePolicy: options.failFast ? "fail-fast" : "continue",
    dryRun: options.dryRun ?? false,
  };
}

/**
 * Validates ctx.options
 *
 * Writes to context:
 * - job: Immutable job configuration
 */
export async function validate(ctx: BatchContext): Promise<void> {
  const job = await resolveJob(ctx.options);

  ctx.logger.debug(`Command: ${job.commandTemplate.join(" ")}`);
  ctx.logger.debug(`Input folder: ${job.inputFolder}`);
  ctx.logger.debug(`Output folder: ${job.outputFolder}`);
  if (job.formatFilter.length > 0) {
    ctx.logger.debug(`Format filter: ${job.formatFilter.join(", ")}`);
  }

  ctx.job = job;
}
