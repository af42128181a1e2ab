/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_CONFIG_FILENAMES, deepMerge, isPlainObject } from "./defaults";
// Loader
export {
  buildConfig,
  canRunWithoutConfigFile,
  ConfigError,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  loadConfig,
  mergeInlineConfig,
  parseConfigContent,
  validateInlineOptionsForConfigFreeMode,
} from "./loader";
// Resolver
export { applyDerivedDefaults, resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
