/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `errlens config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  StyleSchema,
  DispatchSchema,
  ParameterAliasesSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  readConfigFile,
  mergeConfig,
  applyEnvOverrides,
  initConfig,
  listConfig,
  type LoadConfigOptions,
} from './loader.js';

// Paths
export { ERRLENS_DIR, CONFIG_PATH, getConfigPath } from './paths.js';

// Environment variables
export { loadEnv, getEnv, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
