/**
 * Centralized type exports
 */

// Backup types
export type {
  ArchiveError,
  ArchiveRecord,
  BackupItemResult,
  BackupOutcome,
  CopyError,
  FileCopyFailure,
  RotationError,
  RotationResult,
  RunCounts,
  RunSummary,
  ServiceAction,
  ServiceActionRecord,
  ServiceError,
  SourceEntry,
} from "./backup";
// Collaborators
export type { ServiceCoordinator, SnapshotCopier } from "./services";
// Config types
export type {
  ArchiveConfig,
  BackupConfig,
  ComposeConfig,
  LoggingConfig,
  RetentionConfig,
} from "./config";
// Result
export { err, ok, type Result } from "./result";
