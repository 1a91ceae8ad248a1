/**
 * Update command - Downloads the current effect scripts into the bin folder
 */

import ora from "ora";
import { Logger, Tracker, loadConfig } from "../../utils";
import type { UpdateContext } from "../../types";
import * as modules from "../../modules";
import { UpdateOptionsSchema, toUpdateSettings } from "../options";
import type { UpdateOptions } from "../options";

export async function updateCommand(opts: UpdateOptions): Promise<void> {
  const spinner = ora({ text: "Loading configuration...", indent: 2 }).start();

  try {
    const options = UpdateOptionsSchema.parse(opts);
    const { config, errors } = await loadConfig(options.config);

    const tracker = new Tracker();
    for (const err of errors) {
      tracker.trackError(err.path, err.error, "resource");
    }

    // CLI flags override the config file
    const settings = toUpdateSettings(options, config);

    const ctx: UpdateContext = {
      config: settings.config,
      binDir: settings.binDir,
      only: options.only,
      dryRun: options.dryRun,
      tracker,
      logger: new Logger(options.verbose ? "debug" : config.logging.level),
      verbose: options.verbose,
    };

    spinner.text = "Fetching script list...";
    await modules.fetchList(ctx);
    spinner.succeed(`Found ${ctx.scripts?.length ?? 0} scripts`);

    await modules.download(ctx);

    modules.stats(ctx, options.dryRun ? "Dry Run" : "Update");
  } catch (error) {
    spinner.fail("Update failed");
    console.error(error instanceof Error ? error.message : error);
    process.exit(1);
  }
}
