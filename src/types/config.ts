/**
 * Configuration type definitions
 */

import type { LogLevel } from "../utils/logger";

export interface ComposeConfig {
  /** Directory holding one Compose project folder per source entry name */
  projectsDir: string;
  /** Docker CLI binary (default: docker) */
  command: string;
  /** Wait after a successful stop before the copy is retried (default: 10) */
  quiescenceDelaySeconds: number;
}

export interface RetentionConfig {
  /** Number of most recent archives to keep (default: 7) */
  keepCount: number;
}

export interface ArchiveConfig {
  /** Archive filename prefix (default: docker_configs_backup_) */
  prefix: string;
  /** zlib level 0-9 (default: 6) */
  compression: number;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Optional log file, appended to in addition to the console */
  file?: string;
}

// A type alias rather than an interface so it merges as a plain record
export type BackupConfig = {
  version: string;
  /** Root containing one subdirectory per managed service */
  sourceDir: string;
  /** Temporary location for fresh copies before zipping */
  stagingDir: string;
  /** Where archives are written and rotated (default: parent of stagingDir) */
  archiveDir: string;
  compose: ComposeConfig;
  retention: RetentionConfig;
  archive: ArchiveConfig;
  logging: LoggingConfig;
};
