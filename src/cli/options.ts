/**
 * CLI option schemas and the merge of command-line flags over the loaded config
 */

import path from "node:path";
import { z } from "zod";
import { UpdaterConfigSchema } from "../types";
import type { AppConfig, JobOptions, UpdaterConfig } from "../types";
import { resolveFromPackageRoot } from "../utils";

export const RunOptionsSchema = z.object({
  command: z.string().optional(),
  input: z.string().optional(),
  output: z.string().optional(),
  format: z.string().optional(),
  suffix: z.string().optional(),
  path2imagemagick: z.string().optional(),
  failFast: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export const UpdateOptionsSchema = z.object({
  bin: z.string().optional(),
  prefix: z.string().optional(),
  listUrl: z.string().optional(),
  only: z.array(z.string()).optional(),
  dryRun: z.boolean().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;
export type UpdateOptions = z.infer<typeof UpdateOptionsSchema>;

export function toJobOptions(options: RunOptions, config: AppConfig): JobOptions {
  return {
    command: options.command,
    inputFolder: options.input,
    outputFolder: options.output,
    format: options.format,
    suffix: options.suffix,
    toolPath: options.path2imagemagick ?? config.batch.toolPath,
    failFast: options.failFast ?? config.batch.failFast,
    dryRun: options.dryRun,
  };
}

export interface UpdateSettings {
  config: UpdaterConfig;
  binDir: string; // Absolute
}

/**
 * `--bin` is taken relative to the working directory like any path typed
 * at the prompt; a relative `binDir` from config is relative to the
 * project root.
 */
export function toUpdateSettings(
  options: UpdateOptions,
  config: AppConfig,
  cwd: string = process.cwd(),
): UpdateSettings {
  const updater = UpdaterConfigSchema.parse({
    ...config.updater,
    binDir: options.bin ?? config.updater.binDir,
    prefix: options.prefix ?? config.updater.prefix,
    listUrl: options.listUrl ?? config.updater.listUrl,
  });

  return {
    config: updater,
    binDir:
      options.bin !== undefined
        ? path.resolve(cwd, options.bin)
        : resolveFromPackageRoot(updater.binDir),
  };
}
