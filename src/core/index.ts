/**
 * Core module exports
 */

// Backup
export {
  type ArchiveOptions,
  type BackupItemDependencies,
  type BackupOptions,
  BackupRunner,
  type BackupRunnerOptions,
  type CopierFileSystem,
  createArchive,
  createCoordinator,
  DEFAULT_COMPRESSION,
  DEFAULT_QUIESCENCE_DELAY_MS,
  DirectorySnapshotCopier,
  defaultSleep,
  InvalidTransitionError,
  isRunSuccessful,
  type ItemEvent,
  type ItemPhase,
  type ItemState,
  listSourceEntries,
  nodeFileSystem,
  RetryingBackupItem,
  runBackup,
  type Sleep,
  summarizeRun,
  transition,
} from "./backup";

// Cleanup
export {
  DEFAULT_KEEP_COUNT,
  listArchiveFilenames,
  listArchives,
  planRotation,
  type RotateOptions,
  type RotationPlan,
  rotateArchives,
} from "./cleanup";

// Errors
export { BackupPreconditionError, describeCopyError, describeServiceError } from "./errors";
