/**
 * Issue and statistics types shared by the tracker and the stats module
 */

// Type-safe reasons for each issue type
export type InvocationIssueReason = "exit-code" | "signal" | "spawn-error";
export type DownloadIssueReason =
  | "download-failed"
  | "timeout"
  | "invalid-response"
  | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error"
  | "invalid-entry";

// Discriminated union - each type has its own subset of reasons
export interface InvocationIssue {
  type: "invocation";
  path: string;
  reason: InvocationIssueReason;
  details?: string;
}

export interface DownloadIssue {
  type: "download";
  path: string;
  reason: DownloadIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = InvocationIssue | DownloadIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  successfulFiles: number;
  failedFiles: number;
  skippedFiles: number;
  plannedFiles: number;

  // Script counts
  downloadedScripts: number;
  failedScripts: number;

  issues: Issue[];
  duration: number;
}
