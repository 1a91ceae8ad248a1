/**
 * Run command - Loads config, runs the batch and prints the summary
 */

import ora from "ora";
import type { Command } from "commander";
import { BatchRunner } from "../../batch-runner";
import type { BatchStage } from "../../batch-runner";
import { ConfigError, Logger, Tracker, loadConfig } from "../../utils";
import * as modules from "../../modules";
import { RunOptionsSchema, toJobOptions } from "../options";
import type { RunOptions } from "../options";

const STAGE_TEXT: Record<Exclude<BatchStage, "process">, string> = {
  validate: "Validating options...",
  scan: "Scanning files...",
};

export async function runCommand(opts: RunOptions, command: Command): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();

  try {
    // Validate CLI options
    const options = RunOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    // CLI flags override the config file
    const runner = new BatchRunner(toJobOptions(options, config), {
      tracker,
      logger,
      verbose: options.verbose,
      onStage: (stage) => {
        // Child processes write to this terminal from here on
        if (stage === "process") {
          spinner.stop();
          return;
        }
        spinner.text = STAGE_TEXT[stage];
      },
    });

    const ctx = await runner.run();
    modules.stats(ctx, options.dryRun ? "Dry Run" : "Batch");

    if (ctx.aborted) {
      process.exitCode = 2;
    }
  } catch (error) {
    if (error instanceof ConfigError) {
      spinner.fail("Invalid options");
      console.error(error.message);
      console.error("");
      console.error(command.helpInformation());
      process.exit(1);
    }

    spinner.fail("Batch failed");
    console.error(error);
    process.exit(1);
  }
}
