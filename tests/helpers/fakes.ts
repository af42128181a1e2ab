import * as path from "node:path";
import {
  type CopyError,
  err,
  ok,
  type Result,
  type ServiceCoordinator,
  type ServiceError,
  type SnapshotCopier,
} from "../../src/types";

export const busyFailure: CopyError = {
  kind: "partial_failure",
  failures: [{ relativePath: "db.sqlite", cause: "EBUSY" }],
};

/**
 * Copier that fails with the scripted errors for an entry, then succeeds
 */
export class ScriptedCopier implements SnapshotCopier {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, CopyError[]> = {}) {}

  async copy(sourcePath: string): Promise<Result<void, CopyError>> {
    const name = path.basename(sourcePath);
    this.calls.push(name);
    const failure = this.script[name]?.shift();
    return failure ? err(failure) : ok();
  }
}

export interface FakeCoordinatorOptions {
  managed?: string[];
  failStop?: string[];
  failStart?: string[];
  onStop?: (serviceId: string) => void;
}

/**
 * In-memory coordinator recording every call as "<action>:<serviceId>"
 */
export class FakeCoordinator implements ServiceCoordinator {
  readonly calls: string[] = [];

  constructor(private readonly options: FakeCoordinatorOptions = {}) {}

  async isManaged(serviceId: string): Promise<boolean> {
    this.calls.push(`isManaged:${serviceId}`);
    return this.managed(serviceId);
  }

  async stop(serviceId: string): Promise<Result<void, ServiceError>> {
    this.calls.push(`stop:${serviceId}`);
    const result = this.answer(serviceId, "stop", this.options.failStop);
    if (result.ok) this.options.onStop?.(serviceId);
    return result;
  }

  async start(serviceId: string): Promise<Result<void, ServiceError>> {
    this.calls.push(`start:${serviceId}`);
    return this.answer(serviceId, "start", this.options.failStart);
  }

  private managed(serviceId: string): boolean {
    return (this.options.managed ?? []).includes(serviceId);
  }

  private answer(
    serviceId: string,
    action: "stop" | "start",
    failing: string[] = [],
  ): Result<void, ServiceError> {
    if (!this.managed(serviceId)) {
      return err({ kind: "not_managed", serviceId, projectPath: `/compose/${serviceId}` });
    }
    if (failing.includes(serviceId)) {
      return err({ kind: "service_error", serviceId, action, exitCode: 1, output: "boom" });
    }
    return ok();
  }
}
