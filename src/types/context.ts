/**
 * Pipeline contexts - flow through the batch and update pipelines
 * Each module reads what it needs and writes its results back
 */

import type { UpdaterConfig } from "./config";
import type {
  Candidate,
  InvocationResult,
  JobConfig,
  JobOptions,
} from "./files";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type { CommandInvoker } from "../utils/spawn-command";
import type { FetchFn } from "../utils/fetch-text";

/**
 * Shared by every pipeline (and all the stats module needs)
 */
export interface PipelineContext {
  tracker: Tracker;
  logger: Logger;
  verbose?: boolean;
  aborted?: boolean; // Set when a pipeline stopped before the end
}

export interface BatchContext extends PipelineContext {
  // Input - provided at initialization
  options: JobOptions;
  invoke: CommandInvoker;

  job?: JobConfig; // Validator output
  candidates?: Candidate[]; // Scanner output, already filtered, in run order
  results?: InvocationResult[]; // Processor output, one per invocation
}

export interface UpdateContext extends PipelineContext {
  // Input - provided at initialization
  config: UpdaterConfig;
  binDir: string; // Absolute path
  only?: string[];
  dryRun?: boolean;
  fetch?: FetchFn;
  retryDelay?: number;

  scripts?: string[]; // Script names to download, in list order
  written?: string[]; // Paths of the scripts written to disk
}
