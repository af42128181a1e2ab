/**
 * Default configuration values
 */

import { DEFAULT_COMPRESSION } from "../core/backup/archive-creator";
import { DEFAULT_KEEP_COUNT } from "../core/cleanup/retention";
import { DEFAULT_ARCHIVE_PREFIX } from "../utils/naming";

export type PlainObject = Record<string, unknown>;

export const DEFAULT_CONFIG_FILENAMES = [
  "config-backup.config.yaml",
  "config-backup.config.yml",
  "config-backup.config.json",
] as const;

export const DEFAULT_CONFIG = {
  // version, sourceDir, stagingDir and compose.projectsDir have no defaults
  compose: {
    command: "docker",
    quiescenceDelaySeconds: 10,
  },
  retention: {
    keepCount: DEFAULT_KEEP_COUNT,
  },
  archive: {
    prefix: DEFAULT_ARCHIVE_PREFIX,
    compression: DEFAULT_COMPRESSION,
  },
  logging: {
    level: "info",
  },
} satisfies PlainObject;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target.
 * Arrays and scalars are replaced; undefined source values are ignored.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}
