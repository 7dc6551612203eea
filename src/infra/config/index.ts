export type { RoundwatchConfig, ConfigOverrides, HighImpactConfig } from './types.js';
export { DEFAULT_CONFIG, mergeConfig, validateConfig, resolveConfig, type ResolveConfigOptions } from './resolvedConfig.js';
export { loadProjectConfig, getProjectConfigPath } from './project/projectConfig.js';
export { loadEnvOverrides } from './env/config-env-overrides.js';
