/**
 * Batch Runner - Pipeline orchestrator
 * Coordinates the batch pipeline with zero business logic
 */

import type { BatchContext, JobOptions } from "./types";
import { Logger, Tracker, spawnCommand } from "./utils";
import type { CommandInvoker } from "./utils";
import * as modules from "./modules";

export type BatchStage = "validate" | "scan" | "process";

export interface BatchRunnerOptions {
  logger?: Logger;
  tracker?: Tracker;
  invoke?: CommandInvoker;
  verbose?: boolean;
  onStage?: (stage: BatchStage) => void;
}

export class BatchRunner {
  constructor(
    private jobOptions: JobOptions,
    private options: BatchRunnerOptions = {},
  ) {}

  /**
   * Run the batch pipeline and return the finished context
   * Throws ConfigError before any file is touched when the job is invalid
   */
  async run(): Promise<BatchContext> {
    const { onStage } = this.options;

    const ctx: BatchContext = {
      options: this.jobOptions,
      tracker: this.options.tracker ?? new Tracker(),
      logger: this.options.logger ?? new Logger(),
      invoke: this.options.invoke ?? spawnCommand,
      verbose: this.options.verbose,
    };

    onStage?.("validate");
    await modules.validate(ctx);

    onStage?.("scan");
    await modules.scan(ctx);

    onStage?.("process");
    await modules.process(ctx);

    return ctx;
  }
}
