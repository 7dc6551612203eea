/**
 * Configuration types
 */

import type { LogLevel } from '../../shared/ui/index.js';

export interface HighImpactConfig {
  minIncidents: number;
  minFiles: number;
}

/** Fully resolved configuration used by commands */
export interface RoundwatchConfig {
  minRounds: number;
  snapshotFile: string;
  concurrency: number;
  logLevel: LogLevel;
  highImpact: HighImpactConfig;
}

/** Partial configuration from one source (file, environment, CLI flags) */
export interface ConfigOverrides {
  minRounds?: number;
  snapshotFile?: string;
  concurrency?: number;
  logLevel?: LogLevel;
  highImpact?: Partial<HighImpactConfig>;
}
