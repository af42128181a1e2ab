/**
 * Config resolution shared by the commands: config file, inline overrides,
 * or inline options alone.
 */

import {
  ConfigError,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  hasInlineOptions,
  mergeInlineConfig,
  validateInlineOptionsForConfigFreeMode,
} from "../config";
import type { BackupConfig } from "../types";
import { setLogFile, setLogLevel } from "../utils/logger";
import { ui } from "./ui";

/**
 * Load the config for a command. Returns null after reporting the problem
 * when neither a config file nor the inline options are enough.
 */
export async function loadCommandConfig(
  configPath: string | undefined,
  values: Record<string, unknown>,
): Promise<BackupConfig | null> {
  const inlineOptions = extractInlineOptions(values);

  let config: BackupConfig;
  try {
    config = await findAndLoadConfig(configPath);
  } catch (error) {
    // Without an explicit --config, fall back to inline options
    if (!(error instanceof ConfigError) || configPath) {
      throw error;
    }
    if (canRunWithoutConfigFile(inlineOptions)) {
      return createConfigFromInlineOptions(inlineOptions);
    }

    const validation = validateInlineOptionsForConfigFreeMode(inlineOptions);
    ui.error(error.message);
    ui.error("Inline options are insufficient to run without a config file:");
    for (const problem of validation.errors) {
      ui.message(`  - ${problem}`);
    }
    ui.info("Either create a config file or provide --source-dir, --staging-dir and --compose-dir.");
    return null;
  }

  return hasInlineOptions(inlineOptions) ? mergeInlineConfig(config, inlineOptions) : config;
}

/**
 * Apply the config's logging settings. --verbose wins over the configured level.
 */
export function applyLoggingConfig(config: BackupConfig, verbose: boolean): void {
  setLogLevel(verbose ? "debug" : config.logging.level);
  if (config.logging.file) {
    setLogFile(config.logging.file);
  }
}
