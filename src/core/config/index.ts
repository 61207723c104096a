// src/core/config/index.ts
// Configuration system exports

export {
  type BusKind,
  type BusConfig,
  type CallsConfig,
  type SignatureConfig,
  type UiConfig,
  type LogConfig,
  type BusLensConfig,
  type ConfigLayer,
  type ConfigValidation,
  ConfigError,
  DEFAULT_BUS_CONFIG,
  DEFAULT_CALLS_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
