/**
 * Archive creation for backups
 *
 * Zips the staging directory so that its immediate children are the top
 * level of the archive, then removes the staging tree.
 */

import { createWriteStream } from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import archiver from "archiver";
import type { ArchiveError, ArchiveRecord, Result } from "../../types";
import { err, ok } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { DEFAULT_ARCHIVE_PREFIX, generateArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";

export const DEFAULT_COMPRESSION = 6;

export interface ArchiveOptions {
  prefix?: string;
  /** zlib level 0-9 */
  compression?: number;
  /** Timestamp embedded in the archive name (default: now) */
  date?: Date;
}

async function writeZip(sourceDir: string, archivePath: string, compression: number): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(archivePath);
    const zip = archiver("zip", { zlib: { level: compression } });
    let failed = false;
    let failure: unknown;

    // Settles only after the file handle is closed
    output.on("close", () => (failed ? reject(failure) : resolve()));

    const fail = (e: unknown) => {
      if (failed) return;
      failed = true;
      failure = e;
      zip.unpipe(output);
      zip.abort();
      output.destroy();
    };

    output.on("error", fail);
    zip.on("warning", (warning) => {
      if (warning.code === "ENOENT") {
        logger.warn(`File disappeared while archiving: ${warning.message}`);
        return;
      }
      fail(warning);
    });
    zip.on("error", fail);

    zip.pipe(output);
    zip.directory(sourceDir, false);
    zip.finalize().catch(fail);
  });
}

/**
 * Create `<outputDir>/<prefix><timestamp>.zip` from stagingDir.
 * An archive with the same name (same second) is overwritten.
 */
export async function createArchive(
  stagingDir: string,
  outputDir: string,
  options: ArchiveOptions = {},
): Promise<Result<ArchiveRecord, ArchiveError>> {
  const staging = path.resolve(stagingDir);
  const output = path.resolve(outputDir);
  const prefix = options.prefix ?? DEFAULT_ARCHIVE_PREFIX;
  const compression = options.compression ?? DEFAULT_COMPRESSION;
  const createdAt = options.date ?? new Date();

  if (isPathWithinDir(output, staging)) {
    return err({
      kind: "archive_error",
      cause: `Archive directory '${output}' must not be inside the staging directory`,
      stagingPreserved: true,
    });
  }

  const filename = generateArchiveName(prefix, createdAt);
  const archivePath = path.join(output, filename);

  logger.info(`Creating archive: ${archivePath}`);
  logger.debug(`Using zip compression level ${compression}`);

  let sizeBytes: number;
  try {
    await fsp.mkdir(output, { recursive: true });
    await writeZip(staging, archivePath, compression);
    sizeBytes = (await fsp.stat(archivePath)).size;
  } catch (e) {
    logger.error(`Failed to create archive: ${errorMessage(e)}`);
    try {
      await fsp.rm(archivePath, { force: true });
    } catch (cleanupError) {
      logger.warn(`Could not remove incomplete archive ${archivePath}: ${errorMessage(cleanupError)}`);
    }
    return err({ kind: "archive_error", cause: errorMessage(e), stagingPreserved: true });
  }

  logger.info(`Successfully created archive: ${archivePath}`);

  await removeStaging(staging);

  return ok({ filename, path: archivePath, createdAt, sizeBytes });
}

async function removeStaging(staging: string): Promise<void> {
  try {
    logger.info(`Attempting to remove original backup directory: ${staging}`);
    await fsp.rm(staging, { recursive: true, force: true });
    logger.info(`Successfully removed original backup directory: ${staging}`);
  } catch (e) {
    logger.error(`Failed to remove original backup directory '${staging}': ${errorMessage(e)}`);
  }
}
