/**
 * Docker Compose project control for source entries.
 *
 * Each source directory `<sourceDir>/<name>` is owned by the Compose project
 * in `<projectsDir>/<name>`. Stopping that project releases the file handles
 * its containers hold on the directory.
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import type { Result, ServiceAction, ServiceCoordinator, ServiceError } from "../types";
import { err, ok } from "../types";
import { errorCode, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { type CommandResult, type CommandRunner, dockerRun, runCommand } from "./client";

export const COMPOSE_STOP_ARGS: readonly string[] = ["compose", "stop"];
export const COMPOSE_START_ARGS: readonly string[] = ["compose", "up", "-d"];

export interface ComposeCoordinatorOptions {
  /** Directory holding one Compose project folder per service */
  projectsDir: string;
  /** Docker CLI binary (default: docker) */
  command?: string;
  runner?: CommandRunner;
}

export class ComposeServiceCoordinator implements ServiceCoordinator {
  private readonly projectsDir: string;
  private readonly command: string;
  private readonly runner: CommandRunner;

  constructor(options: ComposeCoordinatorOptions) {
    this.projectsDir = path.resolve(options.projectsDir);
    this.command = options.command ?? "docker";
    this.runner = options.runner ?? runCommand;
  }

  getProjectPath(serviceId: string): string {
    return path.join(this.projectsDir, serviceId);
  }

  async isManaged(serviceId: string): Promise<boolean> {
    const projectPath = this.getProjectPath(serviceId);
    if (path.dirname(projectPath) !== this.projectsDir) {
      return false;
    }
    try {
      return (await stat(projectPath)).isDirectory();
    } catch (e) {
      if (errorCode(e) !== "ENOENT") {
        logger.warn(`Cannot inspect Compose project ${projectPath}: ${errorMessage(e)}`);
      }
      return false;
    }
  }

  async stop(serviceId: string): Promise<Result<void, ServiceError>> {
    return this.invoke(serviceId, "stop", COMPOSE_STOP_ARGS);
  }

  async start(serviceId: string): Promise<Result<void, ServiceError>> {
    return this.invoke(serviceId, "start", COMPOSE_START_ARGS);
  }

  private async invoke(
    serviceId: string,
    action: ServiceAction,
    args: readonly string[],
  ): Promise<Result<void, ServiceError>> {
    const projectPath = this.getProjectPath(serviceId);

    if (!(await this.isManaged(serviceId))) {
      logger.warn(`No Compose project for '${serviceId}' at ${projectPath}`);
      return err({ kind: "not_managed", serviceId, projectPath });
    }

    logger.info(`Attempting to ${action} Compose project in: ${projectPath}`);

    let result: CommandResult;
    try {
      result = await dockerRun([...args], {
        cwd: projectPath,
        command: this.command,
        runner: this.runner,
      });
    } catch (e) {
      logger.error(`Unexpected error during ${action} of '${serviceId}'`, e);
      return err({
        kind: "service_error",
        serviceId,
        action,
        exitCode: null,
        output: errorMessage(e),
      });
    }

    if (!result.success) {
      const output = result.stderr || result.stdout;
      logger.error(`Failed to ${action} '${serviceId}' (exit ${result.exitCode ?? "n/a"}): ${output}`);
      return err({
        kind: "service_error",
        serviceId,
        action,
        exitCode: result.exitCode,
        output,
      });
    }

    // compose writes progress to stderr
    const output = result.stdout || result.stderr;
    logger.info(`Successfully ran ${action} for '${serviceId}'${output ? `. Output:\n${output}` : ""}`);
    return ok();
  }
}
