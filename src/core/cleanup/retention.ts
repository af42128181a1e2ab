/**
 * Retention policy logic
 *
 * Archive names embed a fixed-width timestamp, so lexicographic order is
 * chronological order and the directory listing is the only index.
 */

import type { Dirent } from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import type { ArchiveRecord, RotationError, RotationResult } from "../../types";
import { errorCode, errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { DEFAULT_ARCHIVE_PREFIX, isArchiveName, parseArchiveTimestamp } from "../../utils/naming";

export const DEFAULT_KEEP_COUNT = 7;

export interface RotationPlan {
  /** Oldest first */
  toDelete: string[];
  /** Oldest first */
  toKeep: string[];
}

/**
 * Split archive filenames into those to delete and those to keep.
 */
export function planRotation(filenames: string[], keepCount: number): RotationPlan {
  const sorted = [...filenames].sort();
  const keep = Math.max(0, Math.floor(keepCount));
  const cut = Math.max(0, sorted.length - keep);

  return {
    toDelete: sorted.slice(0, cut),
    toKeep: sorted.slice(cut),
  };
}

/**
 * Names of regular files in archiveDir that follow the archive naming
 * convention. A missing directory yields an empty list.
 */
export async function listArchiveFilenames(
  archiveDir: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): Promise<string[]> {
  let dirents: Dirent[];
  try {
    dirents = await fsp.readdir(archiveDir, { withFileTypes: true });
  } catch (e) {
    if (errorCode(e) === "ENOENT") {
      logger.warn(`Backup directory '${archiveDir}' not found during rotation check`);
      return [];
    }
    throw e;
  }

  return dirents
    .filter((d) => d.isFile() && isArchiveName(d.name, prefix))
    .map((d) => d.name)
    .sort();
}

/**
 * Archives in archiveDir, newest first
 */
export async function listArchives(
  archiveDir: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
): Promise<ArchiveRecord[]> {
  const filenames = await listArchiveFilenames(archiveDir, prefix);
  const records: ArchiveRecord[] = [];

  for (const filename of filenames.reverse()) {
    const archivePath = path.join(archiveDir, filename);
    let sizeBytes = 0;
    try {
      sizeBytes = (await fsp.stat(archivePath)).size;
    } catch (e) {
      logger.debug(`Cannot stat ${archivePath}: ${errorMessage(e)}`);
    }
    records.push({
      filename,
      path: archivePath,
      createdAt: parseArchiveTimestamp(filename, prefix),
      sizeBytes,
    });
  }

  return records;
}

export interface RotateOptions {
  prefix?: string;
  /** Report what would be deleted without deleting */
  dryRun?: boolean;
  unlink?: (filePath: string) => Promise<void>;
}

/**
 * Delete all but the keepCount most recent archives in archiveDir.
 * A failed deletion is recorded and the remaining files are still processed.
 */
export async function rotateArchives(
  archiveDir: string,
  keepCount: number,
  options: RotateOptions = {},
): Promise<RotationResult> {
  const { prefix = DEFAULT_ARCHIVE_PREFIX, dryRun = false, unlink = fsp.unlink } = options;

  logger.info(`Checking backup rotation in directory: ${archiveDir}`);

  const filenames = await listArchiveFilenames(archiveDir, prefix);
  if (filenames.length <= keepCount) {
    logger.info(
      `Found ${filenames.length} backups, which is within the limit of ${keepCount}. No rotation needed.`,
    );
    return { deleted: [], kept: filenames, errors: [] };
  }

  const plan = planRotation(filenames, keepCount);
  logger.info(
    `Found ${filenames.length} backups. Need to remove ${plan.toDelete.length} oldest ones.`,
  );

  if (dryRun) {
    for (const filename of plan.toDelete) {
      logger.info(`[DRY RUN] Would delete old backup: ${filename}`);
    }
    return { deleted: plan.toDelete, kept: plan.toKeep, errors: [] };
  }

  const deleted: string[] = [];
  const errors: RotationError[] = [];

  for (const filename of plan.toDelete) {
    try {
      await unlink(path.join(archiveDir, filename));
      deleted.push(filename);
      logger.info(`Successfully deleted old backup: ${filename}`);
    } catch (e) {
      const cause = errorMessage(e);
      errors.push({ kind: "rotation_error", filename, cause });
      logger.error(`Failed to delete old backup '${filename}': ${cause}`);
    }
  }

  return { deleted, kept: plan.toKeep, errors };
}
