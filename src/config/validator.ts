/**
 * Configuration validation
 */

import type { BackupConfig } from "../types";
import { isLogLevel, LOG_LEVELS } from "../utils/logger";
import { isPlainObject, type PlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: PlainObject) => void;

function requireSection(c: PlainObject, name: string): PlainObject {
  const section = c[name];
  if (!isPlainObject(section)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return section;
}

function requirePath(value: unknown, field: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${field} must be a non-empty string`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  directories: (c) => {
    requirePath(c.sourceDir, "sourceDir");
    requirePath(c.stagingDir, "stagingDir");
    requirePath(c.archiveDir, "archiveDir");
  },

  compose: (c) => {
    const compose = requireSection(c, "compose");
    requirePath(compose.projectsDir, "compose.projectsDir");
    if (typeof compose.command !== "string" || compose.command.trim() === "") {
      throw new ConfigError("compose.command must be a non-empty string");
    }
    const delay = compose.quiescenceDelaySeconds;
    if (typeof delay !== "number" || !Number.isFinite(delay) || delay < 0) {
      throw new ConfigError("compose.quiescenceDelaySeconds must be a non-negative number");
    }
  },

  retention: (c) => {
    const retention = requireSection(c, "retention");
    const keep = retention.keepCount;
    if (typeof keep !== "number" || !Number.isInteger(keep) || keep < 1) {
      throw new ConfigError("retention.keepCount must be a positive integer");
    }
  },

  archive: (c) => {
    const archive = requireSection(c, "archive");
    if (typeof archive.prefix !== "string" || archive.prefix === "") {
      throw new ConfigError("archive.prefix must be a non-empty string");
    }
    if (/[\\/]/.test(archive.prefix)) {
      throw new ConfigError("archive.prefix must not contain path separators");
    }
    const level = archive.compression;
    if (typeof level !== "number" || !Number.isInteger(level) || level < 0 || level > 9) {
      throw new ConfigError("archive.compression must be an integer between 0 and 9");
    }
  },

  logging: (c) => {
    const logging = requireSection(c, "logging");
    if (!isLogLevel(logging.level)) {
      throw new ConfigError(`logging.level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    if (logging.file !== undefined) {
      requirePath(logging.file, "logging.file");
    }
  },
};

/**
 * Validate a configuration object (after defaults are merged)
 */
export function validateConfig(config: unknown): asserts config is BackupConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
