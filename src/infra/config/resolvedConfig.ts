/**
 * Configuration resolution
 *
 * Precedence (lowest to highest): defaults, .roundwatch/config.yaml,
 * ROUNDWATCH_* environment variables, command-line flags.
 */

import { isAbsolute } from 'node:path';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_HIGH_IMPACT_MIN_FILES,
  DEFAULT_HIGH_IMPACT_MIN_INCIDENTS,
  DEFAULT_MIN_ROUNDS,
  DEFAULT_SNAPSHOT_FILE,
} from '../../shared/constants.js';
import {
  ConfigurationError,
  assertNonNegativeInteger,
  assertPositiveInteger,
} from '../../core/rounds/errors.js';
import { loadProjectConfig } from './project/projectConfig.js';
import { loadEnvOverrides } from './env/config-env-overrides.js';
import type { ConfigOverrides, RoundwatchConfig } from './types.js';

export const DEFAULT_CONFIG: RoundwatchConfig = {
  minRounds: DEFAULT_MIN_ROUNDS,
  snapshotFile: DEFAULT_SNAPSHOT_FILE,
  concurrency: DEFAULT_CONCURRENCY,
  logLevel: 'info',
  highImpact: {
    minIncidents: DEFAULT_HIGH_IMPACT_MIN_INCIDENTS,
    minFiles: DEFAULT_HIGH_IMPACT_MIN_FILES,
  },
};

export function mergeConfig(base: RoundwatchConfig, overrides: ConfigOverrides): RoundwatchConfig {
  return {
    minRounds: overrides.minRounds ?? base.minRounds,
    snapshotFile: overrides.snapshotFile ?? base.snapshotFile,
    concurrency: overrides.concurrency ?? base.concurrency,
    logLevel: overrides.logLevel ?? base.logLevel,
    highImpact: {
      minIncidents: overrides.highImpact?.minIncidents ?? base.highImpact.minIncidents,
      minFiles: overrides.highImpact?.minFiles ?? base.highImpact.minFiles,
    },
  };
}

export function validateConfig(config: RoundwatchConfig): RoundwatchConfig {
  assertPositiveInteger('minRounds', config.minRounds);
  assertPositiveInteger('concurrency', config.concurrency);
  assertNonNegativeInteger('highImpact.minIncidents', config.highImpact.minIncidents);
  assertNonNegativeInteger('highImpact.minFiles', config.highImpact.minFiles);
  if (config.snapshotFile.trim() === '' || isAbsolute(config.snapshotFile)) {
    throw new ConfigurationError(`snapshotFile must be a relative file name, got "${config.snapshotFile}"`);
  }
  return config;
}

export interface ResolveConfigOptions {
  projectDir: string;
  env?: Readonly<Record<string, string | undefined>>;
  cliOverrides?: ConfigOverrides;
}

export function resolveConfig(options: ResolveConfigOptions): RoundwatchConfig {
  const fromFile = loadProjectConfig(options.projectDir);
  const fromEnv = loadEnvOverrides(options.env ?? process.env);
  const merged = [fromFile, fromEnv, options.cliOverrides ?? {}]
    .reduce(mergeConfig, DEFAULT_CONFIG);
  return validateConfig(merged);
}
