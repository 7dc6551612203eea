/**
 * Project-level configuration
 *
 * Reads .roundwatch/config.yaml from the project directory.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod/v4';
import { CONFIG_DIR_NAME } from '../../../shared/constants.js';
import { LOG_LEVELS } from '../../../shared/ui/index.js';
import { formatSchemaIssues, getErrorMessage } from '../../../shared/utils/index.js';
import { ConfigurationError } from '../../../core/rounds/errors.js';
import type { ConfigOverrides } from '../types.js';

const ProjectConfigSchema = z.object({
  min_rounds: z.number().int().positive().optional(),
  snapshot_file: z.string().min(1).optional(),
  concurrency: z.number().int().positive().optional(),
  log_level: z.enum(LOG_LEVELS).optional(),
  high_impact: z.object({
    min_incidents: z.number().int().nonnegative().optional(),
    min_files: z.number().int().nonnegative().optional(),
  }).optional(),
});

export function getProjectConfigPath(projectDir: string): string {
  return join(resolve(projectDir), CONFIG_DIR_NAME, 'config.yaml');
}

/**
 * Load project configuration from .roundwatch/config.yaml.
 * A missing file yields no overrides; an unreadable or invalid file is a ConfigurationError.
 */
export function loadProjectConfig(projectDir: string): ConfigOverrides {
  const configPath = getProjectConfigPath(projectDir);
  if (!existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Failed to read ${configPath}: ${getErrorMessage(e)}`);
  }
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = ProjectConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${configPath}: ${formatSchemaIssues(parsed.error.issues)}`);
  }

  const config = parsed.data;
  const overrides: ConfigOverrides = {};
  if (config.min_rounds !== undefined) overrides.minRounds = config.min_rounds;
  if (config.snapshot_file !== undefined) overrides.snapshotFile = config.snapshot_file;
  if (config.concurrency !== undefined) overrides.concurrency = config.concurrency;
  if (config.log_level !== undefined) overrides.logLevel = config.log_level;
  if (config.high_impact) {
    overrides.highImpact = {
      ...(config.high_impact.min_incidents !== undefined ? { minIncidents: config.high_impact.min_incidents } : {}),
      ...(config.high_impact.min_files !== undefined ? { minFiles: config.high_impact.min_files } : {}),
    };
  }
  return overrides;
}
