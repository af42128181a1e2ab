/**
 * Backup orchestration: one full pass of copy, archive and rotation
 */

import { randomUUID } from "node:crypto";
import { ComposeServiceCoordinator } from "../../docker/compose";
import type {
  BackupConfig,
  BackupItemResult,
  RunCounts,
  RunSummary,
  ServiceCoordinator,
  SnapshotCopier,
} from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { formatDuration } from "../../utils/naming";
import { rotateArchives } from "../cleanup/retention";
import { createArchive } from "./archive-creator";
import type { Sleep } from "./backup-item";
import { BackupRunner } from "./runner";

export interface BackupOptions {
  /** Only back up these source directories */
  only?: string[];
  coordinator?: ServiceCoordinator;
  copier?: SnapshotCopier;
  sleep?: Sleep;
  now?: () => Date;
}

export function summarizeRun(items: BackupItemResult[]): RunCounts {
  return {
    total: items.length,
    succeeded: items.filter((i) => i.outcome === "succeeded").length,
    recovered: items.filter((i) => i.outcome === "succeeded_after_retry").length,
    failed: items.filter((i) => i.outcome === "failed").length,
  };
}

/**
 * A run is successful when no entry failed and, if anything was attempted,
 * the archive was written. Rotation errors do not fail the run.
 */
export function isRunSuccessful(summary: RunSummary): boolean {
  return summarizeRun(summary.items).failed === 0 && summary.archiveError === null;
}

export function createCoordinator(config: BackupConfig): ServiceCoordinator {
  return new ComposeServiceCoordinator({
    projectsDir: config.compose.projectsDir,
    command: config.compose.command,
  });
}

/**
 * Run one backup pass. Throws only when the run cannot start (see
 * BackupPreconditionError); every other failure is recorded in the summary.
 */
export async function runBackup(
  config: BackupConfig,
  options: BackupOptions = {},
): Promise<RunSummary> {
  const now = options.now ?? (() => new Date());
  const startTime = Date.now();
  const runId = randomUUID();
  const timestamp = now();

  logger.info(`Starting Docker config backup: ${runId}`);

  const runner = new BackupRunner({
    copier: options.copier,
    quiescenceDelayMs: config.compose.quiescenceDelaySeconds * 1000,
    sleep: options.sleep,
    only: options.only,
  });
  const coordinator = options.coordinator ?? createCoordinator(config);

  const items = await runner.run(config.sourceDir, config.stagingDir, coordinator);
  const counts = summarizeRun(items);

  logger.info("--------------------");
  logger.info("Backup process finished.");
  logger.info(`Directories successfully backed up: ${counts.succeeded + counts.recovered}`);
  logger.info(`Directories with errors: ${counts.failed}`);

  const summary: RunSummary = {
    runId,
    timestamp,
    items,
    archivePath: null,
    archiveError: null,
    rotationDeleted: [],
    rotationErrors: [],
    durationMs: 0,
  };

  if (items.length === 0) {
    logger.info("No directories were processed, skipping zip creation.");
    summary.durationMs = Date.now() - startTime;
    return summary;
  }

  const archive = await createArchive(config.stagingDir, config.archiveDir, {
    prefix: config.archive.prefix,
    compression: config.archive.compression,
    date: now(),
  });

  if (!archive.ok) {
    summary.archiveError = archive.error;
    logger.warn("Skipping backup rotation because the archive was not created");
  } else {
    summary.archivePath = archive.value.path;

    try {
      const rotation = await rotateArchives(config.archiveDir, config.retention.keepCount, {
        prefix: config.archive.prefix,
      });
      summary.rotationDeleted = rotation.deleted;
      summary.rotationErrors = rotation.errors;
    } catch (e) {
      logger.error(`An error occurred during backup rotation: ${errorMessage(e)}`);
      summary.rotationErrors = [
        { kind: "rotation_error", filename: config.archiveDir, cause: errorMessage(e) },
      ];
    }
  }

  summary.durationMs = Date.now() - startTime;
  logger.info(`Backup run finished in ${formatDuration(summary.durationMs)}: ${runId}`);

  return summary;
}
