import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { AppConfig, ConfigLoadError, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";
import { fileExists } from "./fs";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("im-batchrun", { suffix: "" });

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial config file (user or custom)
 * Throws on unreadable files, invalid JSON or schema violations
 */
async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: AppConfig,
  override: PartialAppConfig,
): AppConfig {
  return {
    batch: { ...base.batch, ...override.batch },
    updater: { ...base.updater, ...override.updater },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigLoadError[];
}

interface LoadConfigOptions {
  userConfigPath?: string;
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 *
 * A broken user or custom file does not stop the run: it is skipped and
 * reported in `errors`.
 */
export async function loadConfig(
  custom?: string,
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigLoadError[] = [];

  const userConfigPath = options.userConfigPath ?? getUserConfigPath();
  if (await fileExists(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 * - Linux: $XDG_CONFIG_HOME/im-batchrun/config.json or ~/.config/im-batchrun/config.json
 * - macOS: ~/Library/Preferences/im-batchrun/config.json
 * - Windows: %APPDATA%\im-batchrun\config.json
 */
export function getUserConfigPath(): string {
  return join(paths.config, "config.json");
}
