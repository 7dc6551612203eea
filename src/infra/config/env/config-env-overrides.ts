/**
 * Environment variable overrides (ROUNDWATCH_*)
 */

import { isLogLevel } from '../../../shared/ui/index.js';
import { ConfigurationError } from '../../../core/rounds/errors.js';
import type { ConfigOverrides } from '../types.js';

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return parseInt(trimmed, 10);
}

export function loadEnvOverrides(env: Env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const minRounds = readInteger(env, 'ROUNDWATCH_MIN_ROUNDS');
  if (minRounds !== undefined) overrides.minRounds = minRounds;

  const concurrency = readInteger(env, 'ROUNDWATCH_CONCURRENCY');
  if (concurrency !== undefined) overrides.concurrency = concurrency;

  const snapshotFile = env.ROUNDWATCH_SNAPSHOT_FILE?.trim();
  if (snapshotFile) overrides.snapshotFile = snapshotFile;

  const logLevel = env.ROUNDWATCH_LOG_LEVEL?.trim().toLowerCase();
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`ROUNDWATCH_LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
    }
    overrides.logLevel = logLevel;
  }

  const minIncidents = readInteger(env, 'ROUNDWATCH_HIGH_IMPACT_MIN_INCIDENTS');
  const minFiles = readInteger(env, 'ROUNDWATCH_HIGH_IMPACT_MIN_FILES');
  if (minIncidents !== undefined || minFiles !== undefined) {
    overrides.highImpact = {
      ...(minIncidents !== undefined ? { minIncidents } : {}),
      ...(minFiles !== undefined ? { minFiles } : {}),
    };
  }

  return overrides;
}
