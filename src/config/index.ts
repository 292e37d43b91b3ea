/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `cexp config` commands.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  ExplanationStyleSchema,
  OllamaConfigSchema,
  AnalysisConfigSchema,
  OutputConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, ExplanationStyle } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  initConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
  type LoadConfigOptions,
} from './loader.js';

export { CONFIG_DIR, CONFIG_PATH, getConfigDir, getConfigPath } from './paths.js';

export {
  loadEnv,
  getEnv,
  getOllamaHost,
  resolveModel,
  DEFAULT_OLLAMA_HOST,
  OLLAMA_SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars } from './env.js';
