/**
 * Docker CLI wrapper using child_process.execFile
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { errorCode } from "../utils/errors";
import { logger } from "../utils/logger";

const execFileAsync = promisify(execFile);

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  /** null when the process could not be started (e.g. binary not on PATH) */
  exitCode: number | null;
}

export interface CommandOptions {
  cwd?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

function outputField(error: object, key: "stdout" | "stderr"): string {
  const value: unknown = Reflect.get(error, key);
  if (typeof value === "string") return value.trim();
  if (Buffer.isBuffer(value)) return value.toString().trim();
  return "";
}

/**
 * Run a command without a shell and capture its output.
 * Non-zero exits and a missing binary are reported in the result, not thrown.
 */
export async function runCommand(
  command: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options.cwd,
      maxBuffer: MAX_OUTPUT_BYTES,
      encoding: "utf8",
    });
    return {
      success: true,
      stdout: stdout.trim(),
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error) {
    if (error && typeof error === "object") {
      const code: unknown = Reflect.get(error, "code");
      // execFile rejects with the exit status as a number on non-zero exits
      if (typeof code === "number") {
        return {
          success: false,
          stdout: outputField(error, "stdout"),
          stderr: outputField(error, "stderr"),
          exitCode: code,
        };
      }
      if (errorCode(error) === "ENOENT") {
        return {
          success: false,
          stdout: "",
          stderr: `Command not found: ${command}. Is it installed and on PATH?`,
          exitCode: null,
        };
      }
    }
    throw error;
  }
}

/**
 * Run a Docker CLI command and return the result
 */
export async function dockerRun(
  args: string[],
  options: CommandOptions & { command?: string; runner?: CommandRunner } = {},
): Promise<CommandResult> {
  const { command = "docker", runner = runCommand, ...rest } = options;
  logger.debug(`Running: ${command} ${args.join(" ")}${rest.cwd ? ` (in ${rest.cwd})` : ""}`);
  return runner(command, args, rest);
}

/**
 * Check if the Docker daemon is reachable
 */
export async function isDockerAvailable(
  options: { command?: string; runner?: CommandRunner } = {},
): Promise<boolean> {
  try {
    const result = await dockerRun(["info"], options);
    return result.success;
  } catch (e) {
    logger.debug("Docker availability check failed", e);
    return false;
  }
}
