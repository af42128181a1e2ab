/**
 * Directory snapshot copier
 *
 * Copies one source directory into staging, always replacing whatever is at
 * the destination. Symbolic links are recreated with the same target text,
 * including links whose target does not exist. Per-file failures are
 * collected so the rest of the tree still gets copied.
 */

import type { Stats } from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import type { CopyError, FileCopyFailure, Result, SnapshotCopier } from "../../types";
import { err, ok } from "../../types";
import { errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";

/**
 * Filesystem calls used by the copier
 */
export interface CopierFileSystem {
  stat(p: string): Promise<Stats>;
  lstat(p: string): Promise<Stats>;
  readdir(p: string): Promise<string[]>;
  rm(p: string): Promise<void>;
  mkdir(p: string): Promise<void>;
  chmod(p: string, mode: number): Promise<void>;
  copyFile(src: string, dest: string): Promise<void>;
  readlink(p: string): Promise<string>;
  symlink(target: string, p: string): Promise<void>;
}

export const nodeFileSystem: CopierFileSystem = {
  stat: (p) => fsp.stat(p),
  lstat: (p) => fsp.lstat(p),
  readdir: (p) => fsp.readdir(p),
  rm: (p) => fsp.rm(p, { recursive: true, force: true }),
  mkdir: async (p) => {
    await fsp.mkdir(p, { recursive: true });
  },
  chmod: (p, mode) => fsp.chmod(p, mode),
  copyFile: (src, dest) => fsp.copyFile(src, dest),
  readlink: (p) => fsp.readlink(p),
  symlink: (target, p) => fsp.symlink(target, p),
};

export class DirectorySnapshotCopier implements SnapshotCopier {
  constructor(private readonly fs: CopierFileSystem = nodeFileSystem) {}

  async copy(sourcePath: string, destPath: string): Promise<Result<void, CopyError>> {
    let rootStats: Stats;
    try {
      rootStats = await this.fs.stat(sourcePath);
    } catch (e) {
      return err({ kind: "fatal_failure", cause: `Source not accessible: ${errorMessage(e)}` });
    }

    if (!rootStats.isDirectory()) {
      return err({ kind: "fatal_failure", cause: `Source is not a directory: ${sourcePath}` });
    }

    let names: string[];
    try {
      names = await this.fs.readdir(sourcePath);
    } catch (e) {
      return err({ kind: "fatal_failure", cause: `Cannot read source directory: ${errorMessage(e)}` });
    }

    try {
      await this.fs.rm(destPath);
    } catch (e) {
      return err({
        kind: "fatal_failure",
        cause: `Cannot remove existing destination ${destPath}: ${errorMessage(e)}`,
      });
    }

    try {
      await this.fs.mkdir(destPath);
    } catch (e) {
      return err({
        kind: "fatal_failure",
        cause: `Cannot create destination ${destPath}: ${errorMessage(e)}`,
      });
    }

    const failures: FileCopyFailure[] = [];
    await this.copyEntries(sourcePath, destPath, "", names, failures);
    await this.applyMode(destPath, ".", rootStats, failures);

    if (failures.length > 0) {
      return err({ kind: "partial_failure", failures });
    }
    return ok();
  }

  private async copyEntries(
    sourceDir: string,
    destDir: string,
    relativeDir: string,
    names: string[],
    failures: FileCopyFailure[],
  ): Promise<void> {
    for (const name of [...names].sort()) {
      const relativePath = relativeDir ? path.join(relativeDir, name) : name;
      const src = path.join(sourceDir, name);
      const dest = path.join(destDir, name);

      try {
        const stats = await this.fs.lstat(src);

        if (stats.isSymbolicLink()) {
          await this.fs.symlink(await this.fs.readlink(src), dest);
        } else if (stats.isDirectory()) {
          const children = await this.fs.readdir(src);
          await this.fs.mkdir(dest);
          await this.copyEntries(src, dest, relativePath, children, failures);
          await this.applyMode(dest, relativePath, stats, failures);
        } else if (stats.isFile()) {
          await this.fs.copyFile(src, dest);
        } else {
          failures.push({
            relativePath,
            cause: "Special file (socket, FIFO or device) cannot be copied",
          });
        }
      } catch (e) {
        logger.debug(`Failed to copy ${relativePath}: ${errorMessage(e)}`);
        failures.push({ relativePath, cause: errorMessage(e) });
      }
    }
  }

  // Directory modes are applied after their contents so read-only
  // directories can still be filled.
  private async applyMode(
    dest: string,
    relativePath: string,
    stats: Stats,
    failures: FileCopyFailure[],
  ): Promise<void> {
    try {
      await this.fs.chmod(dest, stats.mode & 0o7777);
    } catch (e) {
      failures.push({ relativePath, cause: errorMessage(e) });
    }
  }
}
