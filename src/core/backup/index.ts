/**
 * Backup module exports
 */

export { createArchive, DEFAULT_COMPRESSION, type ArchiveOptions } from "./archive-creator";
export {
  type BackupItemDependencies,
  DEFAULT_QUIESCENCE_DELAY_MS,
  defaultSleep,
  InvalidTransitionError,
  type ItemEvent,
  type ItemPhase,
  type ItemState,
  RetryingBackupItem,
  type Sleep,
  transition,
} from "./backup-item";
export { type CopierFileSystem, DirectorySnapshotCopier, nodeFileSystem } from "./copier";
export {
  type BackupOptions,
  createCoordinator,
  isRunSuccessful,
  runBackup,
  summarizeRun,
} from "./orchestrator";
export { BackupRunner, type BackupRunnerOptions, listSourceEntries } from "./runner";
