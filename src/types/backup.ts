/**
 * Backup run type definitions
 */

/**
 * One top-level directory of the source root, backed up as a unit
 */
export interface SourceEntry {
  /** Directory basename; also the Compose project name used for recovery */
  name: string;
  sourcePath: string;
  /** Location of the fresh copy inside the staging directory */
  destPath: string;
}

export interface FileCopyFailure {
  /** Path relative to the entry's source directory */
  relativePath: string;
  cause: string;
}

/**
 * Copy failures. A partial failure is potentially transient (file busy) and
 * triggers the stop/retry flow; a fatal failure is never retried.
 */
export type CopyError =
  | { kind: "partial_failure"; failures: FileCopyFailure[] }
  | { kind: "fatal_failure"; cause: string };

export type ServiceAction = "stop" | "start";

export type ServiceError =
  | { kind: "not_managed"; serviceId: string; projectPath: string }
  | {
      kind: "service_error";
      serviceId: string;
      action: ServiceAction;
      /** null when the control command could not be run at all */
      exitCode: number | null;
      output: string;
    };

export type BackupOutcome = "succeeded" | "succeeded_after_retry" | "failed";

export interface ServiceActionRecord {
  action: ServiceAction;
  success: boolean;
  detail?: string;
}

export interface BackupItemResult {
  entry: SourceEntry;
  outcome: BackupOutcome;
  /** Most specific failure encountered, for failed entries and failed restarts */
  errorDetail?: string;
  /** Stop/start calls made for this entry, in order */
  serviceActions: ServiceActionRecord[];
}

/**
 * An archive file discovered in the archive directory
 */
export interface ArchiveRecord {
  filename: string;
  path: string;
  /** Decoded from the filename; null if the timestamp part is malformed */
  createdAt: Date | null;
  sizeBytes: number;
}

export interface ArchiveError {
  kind: "archive_error";
  cause: string;
  /** Staging is kept for inspection when the archive could not be written */
  stagingPreserved: boolean;
}

export interface RotationError {
  kind: "rotation_error";
  filename: string;
  cause: string;
}

export interface RotationResult {
  /** Filenames deleted (or, in dry-run mode, that would be deleted), oldest first */
  deleted: string[];
  /** Filenames kept, oldest first */
  kept: string[];
  errors: RotationError[];
}

export interface RunSummary {
  runId: string;
  /** Run start time */
  timestamp: Date;
  items: BackupItemResult[];
  archivePath: string | null;
  archiveError: ArchiveError | null;
  rotationDeleted: string[];
  rotationErrors: RotationError[];
  durationMs: number;
}

export interface RunCounts {
  total: number;
  succeeded: number;
  recovered: number;
  failed: number;
}
