// src/core/config/index.ts
// Configuration system exports

export {
  type LimitsConfig,
  type MachineConfig,
  type PartialConfig,
  type ConfigValidation,
  OUTPUT_LENGTH_CEILING,
  DEFAULT_LIMITS_CONFIG,
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
