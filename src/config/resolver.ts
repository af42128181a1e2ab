/**
 * Configuration path resolution and derived defaults
 */

import * as path from "node:path";
import type { BackupConfig } from "../types";
import type { PlainObject } from "./defaults";

/**
 * Fill in values that default from other values:
 * archiveDir defaults to the parent of stagingDir.
 */
export function applyDerivedDefaults(config: PlainObject): PlainObject {
  if (config.archiveDir === undefined && typeof config.stagingDir === "string") {
    return {
      ...config,
      archiveDir: path.dirname(path.normalize(config.stagingDir.replace(/[\\/]+$/, ""))),
    };
  }
  return config;
}

/**
 * Resolve relative paths in config against baseDir
 */
export function resolvePaths(config: BackupConfig, baseDir: string): BackupConfig {
  const resolve = (p: string) => path.resolve(baseDir, p);

  return {
    ...config,
    sourceDir: resolve(config.sourceDir),
    stagingDir: resolve(config.stagingDir),
    archiveDir: resolve(config.archiveDir),
    compose: {
      ...config.compose,
      projectsDir: resolve(config.compose.projectsDir),
    },
    logging: {
      ...config.logging,
      ...(config.logging.file !== undefined && { file: resolve(config.logging.file) }),
    },
  };
}
