/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import * as fsp from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { BackupConfig } from "../types";
import { errorCode, errorMessage } from "../utils/errors";
import { DEFAULT_CONFIG, DEFAULT_CONFIG_FILENAMES, deepMerge, isPlainObject } from "./defaults";
import { applyDerivedDefaults, resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  type InlineValidationResult,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "./inline";
export { ConfigError } from "./validator";

/**
 * Merge parsed file content with defaults and validate it.
 * Relative paths are resolved against baseDir.
 */
export function buildConfig(parsed: unknown, baseDir: string): BackupConfig {
  if (!isPlainObject(parsed)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = applyDerivedDefaults(deepMerge(DEFAULT_CONFIG, parsed));
  validateConfig(merged);

  return resolvePaths(merged, baseDir);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<BackupConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await fsp.readFile(absolutePath, "utf8");
  } catch (e) {
    if (errorCode(e) === "ENOENT") {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${errorMessage(e)}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext);

  return buildConfig(parsed, path.dirname(absolutePath));
}

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

function isRunningInDocker(): boolean {
  return existsSync("/.dockerenv");
}

/**
 * Find a config file in the given directory or standard locations
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  const searchDirs = [startDir];

  // Only check /config when running in Docker
  if (isRunningInDocker()) {
    searchDirs.push("/config");
  }

  for (const dir of searchDirs) {
    for (const name of DEFAULT_CONFIG_FILENAMES) {
      const configPath = path.join(dir, name);
      if (existsSync(configPath)) {
        return configPath;
      }
    }
  }

  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<BackupConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      `No config file found. Create ${DEFAULT_CONFIG_FILENAMES[0]} or specify --config path`,
    );
  }

  return loadConfig(found);
}
