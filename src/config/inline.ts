/**
 * Inline configuration parsing and merging utilities
 */

import * as path from "node:path";
import type { BackupConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge, type PlainObject } from "./defaults";
import { applyDerivedDefaults } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Directory whose subdirectories are backed up */
  sourceDir?: string;
  /** Temporary copy location, zipped then removed */
  stagingDir?: string;
  /** Where archives are written and rotated */
  archiveDir?: string;
  /** Directory holding one Compose project per source entry */
  composeDir?: string;
  keepCount?: number;
  archivePrefix?: string;
  /** Compression level (0-9) */
  compression?: number;
  /** Seconds to wait after stopping a service before retrying */
  quiescenceDelay?: number;
  logFile?: string;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  "source-dir": { type: "string" },
  "staging-dir": { type: "string" },
  "archive-dir": { type: "string" },
  "compose-dir": { type: "string" },
  keep: { type: "string" },
  "archive-prefix": { type: "string" },
  compression: { type: "string" },
  "quiescence-delay": { type: "string" },
  "log-file": { type: "string" },
} as const;

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" && value !== "" ? value : undefined;
}

function numberValue(value: unknown, flag: string): number | undefined {
  const raw = stringValue(value);
  if (raw === undefined) return undefined;

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`--${flag} must be a number, got '${raw}'`);
  }
  return parsed;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  return {
    sourceDir: stringValue(values["source-dir"]),
    stagingDir: stringValue(values["staging-dir"]),
    archiveDir: stringValue(values["archive-dir"]),
    composeDir: stringValue(values["compose-dir"]),
    keepCount: numberValue(values.keep, "keep"),
    archivePrefix: stringValue(values["archive-prefix"]),
    compression: numberValue(values.compression, "compression"),
    quiescenceDelay: numberValue(values["quiescence-delay"], "quiescence-delay"),
    logFile: stringValue(values["log-file"]),
  };
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Object.values(options).some((value) => value !== undefined);
}

/**
 * Build a partial config from inline options.
 * Paths given on the command line are resolved against the working directory.
 */
export function buildInlineConfig(options: InlineConfigOptions): PlainObject {
  const resolve = (p: string | undefined) => (p === undefined ? undefined : path.resolve(p));

  return {
    sourceDir: resolve(options.sourceDir),
    stagingDir: resolve(options.stagingDir),
    archiveDir: resolve(options.archiveDir),
    compose: {
      projectsDir: resolve(options.composeDir),
      quiescenceDelaySeconds: options.quiescenceDelay,
    },
    retention: { keepCount: options.keepCount },
    archive: {
      prefix: options.archivePrefix,
      compression: options.compression,
    },
    logging: { file: resolve(options.logFile) },
  };
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: BackupConfig,
  inlineOptions: InlineConfigOptions,
): BackupConfig {
  const merged = deepMerge(baseConfig, buildInlineConfig(inlineOptions));
  validateConfig(merged);
  return merged;
}

/**
 * Validation result for inline options
 */
export interface InlineValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check if inline options are sufficient to run without a config file.
 * Requires --source-dir, --staging-dir and --compose-dir.
 */
export function validateInlineOptionsForConfigFreeMode(
  options: InlineConfigOptions,
): InlineValidationResult {
  const errors: string[] = [];

  if (!options.sourceDir) {
    errors.push("--source-dir is required when running without a config file");
  }
  if (!options.stagingDir) {
    errors.push("--staging-dir is required when running without a config file");
  }
  if (!options.composeDir) {
    errors.push("--compose-dir is required when running without a config file");
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Check if inline options can support config-free mode
 */
export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return validateInlineOptionsForConfigFreeMode(options).valid;
}

/**
 * Create a complete config from inline options only (no base config file).
 * Used when running without a config file.
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): BackupConfig {
  const validation = validateInlineOptionsForConfigFreeMode(options);
  if (!validation.valid) {
    throw new ConfigError(validation.errors.join("\n"));
  }

  const config = applyDerivedDefaults(
    deepMerge(deepMerge(DEFAULT_CONFIG, { version: "1" }), buildInlineConfig(options)),
  );
  validateConfig(config);

  return config;
}
