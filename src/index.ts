/**
 * Library entry point
 */

export * from './core/rounds/index.js';
export { locateRounds, type RoundLocation } from './infra/fs/round-locator.js';
export { loadSnapshot } from './infra/fs/snapshot-loader.js';
export * from './features/analysis/index.js';
export * from './features/snapshot/index.js';
export { resolveConfig, DEFAULT_CONFIG, type RoundwatchConfig } from './infra/config/index.js';
