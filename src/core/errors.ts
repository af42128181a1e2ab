/**
 * Run-level errors and failure descriptions
 */

import type { CopyError, ServiceError } from "../types";

/**
 * Raised when a run cannot start at all (unreadable source root, staging
 * directory cannot be created). Per-entry failures never raise.
 */
export class BackupPreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BackupPreconditionError";
  }
}

const MAX_LISTED_FAILURES = 5;

export function describeCopyError(error: CopyError): string {
  if (error.kind === "fatal_failure") {
    return error.cause;
  }

  const listed = error.failures
    .slice(0, MAX_LISTED_FAILURES)
    .map((f) => `${f.relativePath} (${f.cause})`)
    .join("; ");
  const more =
    error.failures.length > MAX_LISTED_FAILURES
      ? `; and ${error.failures.length - MAX_LISTED_FAILURES} more`
      : "";
  return `${error.failures.length} file(s) could not be copied: ${listed}${more}`;
}

export function describeServiceError(error: ServiceError): string {
  if (error.kind === "not_managed") {
    return `No Compose project for '${error.serviceId}' at ${error.projectPath}`;
  }
  const exit = error.exitCode === null ? "not run" : `exit ${error.exitCode}`;
  return `Service ${error.action} failed for '${error.serviceId}' (${exit}): ${error.output}`;
}
