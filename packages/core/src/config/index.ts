/**
 * Configuration Module
 */

export {
  loadConfig,
  getConfig,
  clearConfigCache,
  buildConfigFromEnv,
  getConfigPaths,
  deepSubstituteEnvVars,
  type LoadConfigOptions,
} from './loader.js';

export * from './schema.js';
