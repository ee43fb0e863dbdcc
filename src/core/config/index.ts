// src/core/config/index.ts
// Configuration system exports

export {
  type LogLevel,
  type VMConfig,
  type LogConfig,
  type RuleVMConfig,
  type PartialConfig,
  type ConfigValidation,
  DEFAULT_VM_CONFIG,
  DEFAULT_LOG_CONFIG,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
