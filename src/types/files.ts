/**
 * Batch job type definitions
 */

export type FailurePolicy = "continue" | "fail-fast";

/**
 * Raw job options as they arrive from the CLI, before validation
 */
export interface JobOptions {
  command?: string;
  inputFolder?: string;
  outputFolder?: string;
  format?: string;
  suffix?: string;
  toolPath?: string | null;
  failFast?: boolean;
  dryRun?: boolean;
}

/**
 * Validated job configuration. Built once by the validator, never mutated.
 */
export interface JobConfig {
  commandTemplate: readonly string[]; // argv tokens, program first
  inputFolder: string; // Absolute path
  outputFolder: string; // Absolute path
  formatFilter: readonly string[]; // Lowercase tokens, empty = no filtering
  suffix: string | null; // Output extension override, without leading dot
  toolPath: string | null; // Prepended to PATH for every invocation
  failurePolicy: FailurePolicy;
  dryRun: boolean;
}

export interface Candidate {
  inputPath: string; // Absolute path inside the input folder
  filename: string; // Entry name with extension
  outputPath: string; // Derived output path
}

export interface InvocationResult {
  inputPath: string;
  outputPath: string;
  exitCode: number | null; // null when killed by a signal or never started
  signal: NodeJS.Signals | null;
  duration: number; // In milliseconds
  error?: Error; // Set when the process could not be started
}
