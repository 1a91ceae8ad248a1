/**
 * Utility exports
 */

// Command utilities
export { tokenizeCommand } from "./tokenize-command";
export { formatCommand } from "./format-command";
export { spawnCommand, buildInvocationEnv } from "./spawn-command";
export type {
  CommandInvoker,
  InvokeOptions,
  InvocationOutcome,
} from "./spawn-command";

// Path/filename utilities
export { parseFormatFilter, matchesFormatFilter } from "./format-filter";
export { deriveOutputPath } from "./derive-output-path";

// Filesystem utilities
export { fileExists, isReadable, isDirectory } from "./fs";
export { PACKAGE_ROOT, resolveFromPackageRoot } from "./package-root";

// Network utilities
export { fetchText, fetchBuffer } from "./fetch-text";
export type { FetchFn, FetchOptions } from "./fetch-text";
export { parseScriptList, buildDownloadUrl } from "./script-list";
export type { ScriptList } from "./script-list";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { ConfigError } from "./config-error";
export { Logger } from "./logger";
export { Tracker } from "./tracker";
