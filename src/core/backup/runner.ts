/**
 * Backup runner: enumerates the source root and backs up each entry in turn
 */

import * as fsp from "node:fs/promises";
import * as path from "node:path";
import type { BackupItemResult, ServiceCoordinator, SnapshotCopier, SourceEntry } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { BackupPreconditionError } from "../errors";
import { RetryingBackupItem, type Sleep } from "./backup-item";
import { DirectorySnapshotCopier } from "./copier";

export interface BackupRunnerOptions {
  copier?: SnapshotCopier;
  quiescenceDelayMs?: number;
  sleep?: Sleep;
  /** Restrict the run to these entry names */
  only?: string[];
}

/**
 * List the immediate subdirectories of sourceRoot as entries, sorted by name.
 * Links to directories count as directories; anything else is skipped.
 */
export async function listSourceEntries(
  sourceRoot: string,
  stagingRoot: string,
): Promise<SourceEntry[]> {
  let names: string[];
  try {
    names = await fsp.readdir(sourceRoot);
  } catch (e) {
    throw new BackupPreconditionError(
      `Source directory '${sourceRoot}' cannot be read: ${errorMessage(e)}`,
    );
  }

  const entries: SourceEntry[] = [];
  for (const name of [...names].sort()) {
    const sourcePath = path.join(sourceRoot, name);
    let isDirectory = false;
    try {
      isDirectory = (await fsp.stat(sourcePath)).isDirectory();
    } catch (e) {
      logger.debug(`Skipping unreadable item: ${name} (${errorMessage(e)})`);
      continue;
    }

    if (!isDirectory) {
      logger.debug(`Skipping non-directory item: ${name}`);
      continue;
    }

    entries.push({ name, sourcePath, destPath: path.join(stagingRoot, name) });
  }

  return entries;
}

export class BackupRunner {
  private readonly copier: SnapshotCopier;

  constructor(private readonly options: BackupRunnerOptions = {}) {
    this.copier = options.copier ?? new DirectorySnapshotCopier();
  }

  /**
   * Back up every entry of sourceRoot into stagingRoot, one at a time.
   * Returns exactly one result per entry; entry failures never abort the run.
   */
  async run(
    sourceRoot: string,
    stagingRoot: string,
    coordinator: ServiceCoordinator,
  ): Promise<BackupItemResult[]> {
    const source = path.resolve(sourceRoot);
    const staging = path.resolve(stagingRoot);

    logger.info(`Source directory: ${source}`);
    logger.info(`Destination directory: ${staging}`);

    if (isPathWithinDir(staging, source)) {
      throw new BackupPreconditionError(
        `Staging directory '${staging}' must not be inside the source directory '${source}'`,
      );
    }

    let entries = await listSourceEntries(source, staging);

    if (this.options.only && this.options.only.length > 0) {
      const wanted = new Set(this.options.only);
      for (const name of wanted) {
        if (!entries.some((e) => e.name === name)) {
          logger.warn(`Requested directory not found in source: ${name}`);
        }
      }
      entries = entries.filter((e) => wanted.has(e.name));
    }

    await this.prepareStaging(staging);

    const item = new RetryingBackupItem({
      copier: this.copier,
      coordinator,
      quiescenceDelayMs: this.options.quiescenceDelayMs,
      sleep: this.options.sleep,
    });

    const results: BackupItemResult[] = [];
    for (const entry of entries) {
      try {
        results.push(await item.run(entry));
      } catch (e) {
        logger.error(`Unexpected error while backing up '${entry.name}'`, e);
        results.push({
          entry,
          outcome: "failed",
          errorDetail: `Unexpected error: ${errorMessage(e)}`,
          serviceActions: [],
        });
      }
    }

    return results;
  }

  /**
   * Create the staging directory and empty it. Anything still there is left
   * over from an earlier run whose archive step did not finish.
   */
  private async prepareStaging(staging: string): Promise<void> {
    try {
      await fsp.mkdir(staging, { recursive: true });
    } catch (e) {
      throw new BackupPreconditionError(
        `Staging directory '${staging}' cannot be created: ${errorMessage(e)}`,
      );
    }

    let existing: string[];
    try {
      existing = await fsp.readdir(staging);
    } catch (e) {
      throw new BackupPreconditionError(
        `Staging directory '${staging}' cannot be read: ${errorMessage(e)}`,
      );
    }

    for (const name of existing) {
      logger.warn(`Removing stale staging item from an earlier run: ${name}`);
      try {
        await fsp.rm(path.join(staging, name), { recursive: true, force: true });
      } catch (e) {
        throw new BackupPreconditionError(
          `Stale staging item '${name}' cannot be removed: ${errorMessage(e)}`,
        );
      }
    }
  }
}
