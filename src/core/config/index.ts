// src/core/config/index.ts
// Configuration system exports

export {
  type ParserConfig,
  type RuntimeConfig,
  type KnotConfig,
  type PartialKnotConfig,
  type ConfigValidation,
  DEFAULT_PARSER_CONFIG,
  DEFAULT_RUNTIME_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  partialConfigFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
