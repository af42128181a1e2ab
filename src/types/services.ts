/**
 * Collaborator interfaces used by the backup state machine.
 * Production implementations live in core/backup/copier.ts and docker/compose.ts.
 */

import type { CopyError, ServiceError } from "./backup";
import type { Result } from "./result";

export interface SnapshotCopier {
  /**
   * Replace destPath with a fresh copy of the sourcePath tree
   */
  copy(sourcePath: string, destPath: string): Promise<Result<void, CopyError>>;
}

export interface ServiceCoordinator {
  /** Whether serviceId maps to an existing external project */
  isManaged(serviceId: string): Promise<boolean>;
  stop(serviceId: string): Promise<Result<void, ServiceError>>;
  start(serviceId: string): Promise<Result<void, ServiceError>>;
}
