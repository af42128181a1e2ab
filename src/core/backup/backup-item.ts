/**
 * Per-entry backup state machine.
 *
 *   initial -> copying -> done (succeeded)
 *                      -> done (failed)        fatal copy error, or no Compose project
 *                      -> stopping -> waiting -> retry_copying -> restarting -> done
 *                                  -> restarting -> done        stop failed
 *
 * Every path through `stopping` passes through `restarting`, so a stopped
 * service is always started again whatever happens to the retry.
 */

import type {
  BackupItemResult,
  BackupOutcome,
  CopyError,
  Result,
  ServiceActionRecord,
  ServiceCoordinator,
  ServiceError,
  SnapshotCopier,
  SourceEntry,
} from "../../types";
import { err } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { describeCopyError, describeServiceError } from "../errors";

export const DEFAULT_QUIESCENCE_DELAY_MS = 10_000;

export type ItemState =
  | { phase: "initial" }
  | { phase: "copying" }
  | { phase: "stopping"; copyFailure: string }
  | { phase: "waiting"; copyFailure: string }
  | { phase: "retry_copying"; copyFailure: string }
  | { phase: "restarting"; outcome: BackupOutcome; errorDetail: string | undefined }
  | { phase: "done"; outcome: BackupOutcome; errorDetail: string | undefined };

export type ItemEvent =
  | { type: "begin" }
  | { type: "copy_succeeded" }
  | { type: "copy_failed"; error: CopyError; managed: boolean }
  | { type: "stop_succeeded" }
  | { type: "stop_failed"; error: ServiceError }
  | { type: "wait_elapsed" }
  | { type: "retry_succeeded" }
  | { type: "retry_failed"; error: CopyError }
  | { type: "restart_finished"; error?: ServiceError };

export type ItemPhase = ItemState["phase"];

export class InvalidTransitionError extends Error {
  constructor(phase: ItemPhase, event: ItemEvent["type"]) {
    super(`Invalid backup item transition: '${event}' in phase '${phase}'`);
    this.name = "InvalidTransitionError";
  }
}

/**
 * Pure transition function of the backup item state machine
 */
export function transition(state: ItemState, event: ItemEvent): ItemState {
  switch (state.phase) {
    case "initial":
      if (event.type === "begin") return { phase: "copying" };
      break;

    case "copying":
      if (event.type === "copy_succeeded") {
        return { phase: "done", outcome: "succeeded", errorDetail: undefined };
      }
      if (event.type === "copy_failed") {
        const copyFailure = describeCopyError(event.error);
        // Fatal errors are not retryable, and without a Compose project
        // there is nothing to stop
        if (event.error.kind === "fatal_failure" || !event.managed) {
          return { phase: "done", outcome: "failed", errorDetail: copyFailure };
        }
        return { phase: "stopping", copyFailure };
      }
      break;

    case "stopping":
      if (event.type === "stop_succeeded") {
        return { phase: "waiting", copyFailure: state.copyFailure };
      }
      if (event.type === "stop_failed") {
        return {
          phase: "restarting",
          outcome: "failed",
          errorDetail: `${describeServiceError(event.error)} (initial copy: ${state.copyFailure})`,
        };
      }
      break;

    case "waiting":
      if (event.type === "wait_elapsed") {
        return { phase: "retry_copying", copyFailure: state.copyFailure };
      }
      break;

    case "retry_copying":
      if (event.type === "retry_succeeded") {
        return { phase: "restarting", outcome: "succeeded_after_retry", errorDetail: undefined };
      }
      if (event.type === "retry_failed") {
        return {
          phase: "restarting",
          outcome: "failed",
          errorDetail: `Retry failed: ${describeCopyError(event.error)}`,
        };
      }
      break;

    case "restarting":
      if (event.type === "restart_finished") {
        // A failed restart does not undo a recovered copy; it is reported
        // alongside it
        const restartFailure = event.error ? describeServiceError(event.error) : undefined;
        const errorDetail =
          state.outcome === "failed" || !restartFailure ? state.errorDetail : restartFailure;
        return { phase: "done", outcome: state.outcome, errorDetail };
      }
      break;

    case "done":
      break;
  }

  throw new InvalidTransitionError(state.phase, event.type);
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export interface BackupItemDependencies {
  copier: SnapshotCopier;
  coordinator: ServiceCoordinator;
  /** Fixed wait after a successful stop (default: 10s) */
  quiescenceDelayMs?: number;
  sleep?: Sleep;
}

/**
 * Drives one source entry through the state machine, performing the side
 * effect each phase calls for.
 */
export class RetryingBackupItem {
  private readonly copier: SnapshotCopier;
  private readonly coordinator: ServiceCoordinator;
  private readonly quiescenceDelayMs: number;
  private readonly sleep: Sleep;

  constructor(deps: BackupItemDependencies) {
    this.copier = deps.copier;
    this.coordinator = deps.coordinator;
    this.quiescenceDelayMs = deps.quiescenceDelayMs ?? DEFAULT_QUIESCENCE_DELAY_MS;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async run(entry: SourceEntry): Promise<BackupItemResult> {
    const serviceActions: ServiceActionRecord[] = [];
    let state: ItemState = { phase: "initial" };

    logger.info(`Attempting to back up directory: ${entry.name}`);

    for (;;) {
      if (state.phase === "done") {
        return this.finish(entry, state, serviceActions);
      }
      const event = await this.perform(state, entry, serviceActions);
      state = transition(state, event);
    }
  }

  private finish(
    entry: SourceEntry,
    state: Extract<ItemState, { phase: "done" }>,
    serviceActions: ServiceActionRecord[],
  ): BackupItemResult {
    switch (state.outcome) {
      case "succeeded":
        logger.info(`Successfully backed up directory: ${entry.name}`);
        break;
      case "succeeded_after_retry":
        logger.info(`Successfully backed up directory '${entry.name}' on retry`);
        break;
      case "failed":
        logger.error(`Backup failed for directory '${entry.name}': ${state.errorDetail ?? "unknown error"}`);
        break;
    }

    return {
      entry,
      outcome: state.outcome,
      errorDetail: state.errorDetail,
      serviceActions,
    };
  }

  private async perform(
    state: Exclude<ItemState, { phase: "done" }>,
    entry: SourceEntry,
    serviceActions: ServiceActionRecord[],
  ): Promise<ItemEvent> {
    switch (state.phase) {
      case "initial":
        return { type: "begin" };

      case "copying": {
        const result = await this.safeCopy(entry);
        if (result.ok) return { type: "copy_succeeded" };

        logger.error(`Initial copy failed for directory '${entry.name}': ${describeCopyError(result.error)}`);
        if (result.error.kind === "fatal_failure") {
          return { type: "copy_failed", error: result.error, managed: false };
        }

        const managed = await this.safeIsManaged(entry.name);
        if (managed) {
          logger.info(`Attempting Compose stop/retry/start for '${entry.name}'...`);
        } else {
          logger.warn(`No Compose project found for '${entry.name}'. Skipping stop/retry/start.`);
        }
        return { type: "copy_failed", error: result.error, managed };
      }

      case "stopping": {
        const result = await this.callService(entry.name, "stop", serviceActions);
        return result.ok ? { type: "stop_succeeded" } : { type: "stop_failed", error: result.error };
      }

      case "waiting": {
        logger.info(
          `Waiting ${Math.round(this.quiescenceDelayMs / 1000)} seconds for file locks to release...`,
        );
        await this.sleep(this.quiescenceDelayMs);
        return { type: "wait_elapsed" };
      }

      case "retry_copying": {
        logger.info(`Retrying copy for '${entry.name}'...`);
        const result = await this.safeCopy(entry);
        if (result.ok) return { type: "retry_succeeded" };

        if (result.error.kind === "partial_failure") {
          for (const failure of result.error.failures) {
            logger.warn(`  - Failed to copy file on retry: ${failure.relativePath} due to: ${failure.cause}`);
          }
        }
        return { type: "retry_failed", error: result.error };
      }

      case "restarting": {
        const result = await this.callService(entry.name, "start", serviceActions);
        return result.ok ? { type: "restart_finished" } : { type: "restart_finished", error: result.error };
      }
    }
  }

  private async safeCopy(entry: SourceEntry): Promise<Result<void, CopyError>> {
    try {
      return await this.copier.copy(entry.sourcePath, entry.destPath);
    } catch (e) {
      return err({ kind: "fatal_failure", cause: `Unexpected copy error: ${errorMessage(e)}` });
    }
  }

  private async safeIsManaged(serviceId: string): Promise<boolean> {
    try {
      return await this.coordinator.isManaged(serviceId);
    } catch (e) {
      logger.error(`Cannot determine whether '${serviceId}' is managed`, e);
      return false;
    }
  }

  private async callService(
    serviceId: string,
    action: "stop" | "start",
    serviceActions: ServiceActionRecord[],
  ): Promise<Result<void, ServiceError>> {
    let result: Result<void, ServiceError>;
    try {
      result =
        action === "stop"
          ? await this.coordinator.stop(serviceId)
          : await this.coordinator.start(serviceId);
    } catch (e) {
      result = err({
        kind: "service_error",
        serviceId,
        action,
        exitCode: null,
        output: errorMessage(e),
      });
    }

    serviceActions.push(
      result.ok
        ? { action, success: true }
        : { action, success: false, detail: describeServiceError(result.error) },
    );
    return result;
  }
}
