// src/core/config/index.ts
// Configuration system exports

export {
  type RuntimeConfig,
  type ReplConfig,
  type SchemeConfig,
  type PartialSchemeConfig,
  type ConfigValidation,
  ConfigError,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_REPL_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
