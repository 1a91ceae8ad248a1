/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  BatchConfig,
  UpdaterConfig,
  LoggingConfig,
  LogLevel,
  ConfigLoadError,
} from "./config";
export {
  AppConfigSchema,
  PartialAppConfigSchema,
  BatchConfigSchema,
  UpdaterConfigSchema,
} from "./config";

// Jobs
export type {
  FailurePolicy,
  JobOptions,
  JobConfig,
  Candidate,
  InvocationResult,
} from "./files";

// Issues and stats
export type {
  Issue,
  IssueType,
  InvocationIssue,
  DownloadIssue,
  ResourceIssue,
  InvocationIssueReason,
  DownloadIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./issues";

// Context
export type { PipelineContext, BatchContext, UpdateContext } from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
