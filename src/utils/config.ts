/**
 * Configuration utilities: defaults, file and environment loading, validation
 */

export * from './config/types';
export { validateConfigFile, validateSyncConfig } from './config/ConfigValidator';
export {
  loadConfigFile,
  loadEnvConfig,
  loadSyncConfig,
  mergeConfigs
} from './config/ConfigLoader';
export type { Environment, LoadConfigOptions, LoadedConfig } from './config/ConfigLoader';
