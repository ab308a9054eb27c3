/**
 * Configuration module - exports config loading and paths
 */

export { loadOutputConfig, toCoordinatorOptions, DEFAULT_OUTPUT_CONFIG } from './loadConfig.js';
export type { LoadConfigOptions } from './loadConfig.js';
export { applyOutputConfigEnvOverrides, envVarNameFromPath } from './env/config-env-overrides.js';
export { CONFIG_FILE_NAME, STATE_DIR_NAME, getDefaultConfigPath, resolveConfigPath } from './paths.js';
