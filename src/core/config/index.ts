// src/core/config/index.ts
// Configuration system exports

export {
  type EofBehavior,
  type EngineConfig,
  type NativeConfig,
  type TapewormConfig,
  type ConfigOverrides,
  type ConfigValidation,
  type LoadConfigOptions,
  type ResolvedConfig,
  EOF_BEHAVIORS,
  DEFAULT_ENGINE_CONFIG,
  DEFAULT_NATIVE_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  isEofBehavior,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
  resolveConfig,
} from "./config";
