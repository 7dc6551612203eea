/**
 * CLI command handlers.
 *
 * Each handler returns an exit code instead of exiting so it can be
 * exercised in-process.
 */

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ExitCode } from '../../shared/constants.js';
import { LogManager, error, info, print, warn } from '../../shared/ui/index.js';
import { ConfigurationError } from '../../core/rounds/index.js';
import type { AnalysisWarning, IssueSet } from '../../core/rounds/index.js';
import { resolveConfig, type ConfigOverrides, type RoundwatchConfig } from '../../infra/config/index.js';
import {
  analyze,
  formatAnalysisReport,
  formatWarning,
  serializeAnalysisResult,
} from '../../features/analysis/index.js';
import {
  findIssuesInFile,
  formatAffectedFiles,
  formatFileIssues,
  formatSnapshotSummary,
  inspectSnapshot,
  listAffectedFiles,
  summarizeSnapshot,
} from '../../features/snapshot/index.js';

export interface CommandContext {
  cwd: string;
  env: Readonly<Record<string, string | undefined>>;
}

export interface AnalyzeCommandOptions {
  minRounds?: number;
  minIncidents?: number;
  minFiles?: number;
  snapshotFile?: string;
  concurrency?: number;
  json?: boolean;
  verbose?: boolean;
}

function defaultContext(): CommandContext {
  return { cwd: process.cwd(), env: process.env };
}

function reportWarnings(warnings: readonly AnalysisWarning[]): void {
  for (const warning of warnings) {
    warn(formatWarning(warning));
  }
}

/** Resolve configuration and apply its log level; null when it is invalid */
function loadConfig(context: CommandContext, cliOverrides: ConfigOverrides, verbose = false): RoundwatchConfig | null {
  let config: RoundwatchConfig;
  try {
    config = resolveConfig({ projectDir: context.cwd, env: context.env, cliOverrides });
  } catch (e) {
    if (e instanceof ConfigurationError) {
      error(`Configuration error: ${e.message}`);
      return null;
    }
    throw e;
  }
  LogManager.getInstance().setLogLevel(verbose ? 'debug' : config.logLevel);
  return config;
}

function toOverrides(options: AnalyzeCommandOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.minRounds !== undefined) overrides.minRounds = options.minRounds;
  if (options.snapshotFile !== undefined) overrides.snapshotFile = options.snapshotFile;
  if (options.concurrency !== undefined) overrides.concurrency = options.concurrency;
  if (options.minIncidents !== undefined || options.minFiles !== undefined) {
    overrides.highImpact = {
      ...(options.minIncidents !== undefined ? { minIncidents: options.minIncidents } : {}),
      ...(options.minFiles !== undefined ? { minFiles: options.minFiles } : {}),
    };
  }
  return overrides;
}

export async function runAnalyzeCommand(
  workspace: string,
  options: AnalyzeCommandOptions,
  context: CommandContext = defaultContext(),
): Promise<ExitCode> {
  const config = loadConfig(context, toOverrides(options), options.verbose);
  if (!config) return ExitCode.Failure;

  const workspaceRoot = resolve(context.cwd, workspace);
  if (!existsSync(workspaceRoot)) {
    error(`Workspace directory '${workspace}' not found`);
    info('Run this command from the project directory where the remediation rounds were recorded');
    return ExitCode.Failure;
  }

  const result = await analyze(workspaceRoot, {
    minRounds: config.minRounds,
    thresholds: config.highImpact,
    snapshotFile: config.snapshotFile,
    concurrency: config.concurrency,
  });

  print(options.json ? serializeAnalysisResult(result) : formatAnalysisReport(result));
  reportWarnings(result.warnings);

  return result.outcome.kind === 'insufficient_data' ? ExitCode.InsufficientRounds : ExitCode.Ok;
}

async function withSnapshot(
  snapshotPath: string,
  context: CommandContext,
  render: (issues: IssueSet) => string,
): Promise<ExitCode> {
  if (!loadConfig(context, {})) return ExitCode.Failure;

  const inspected = await inspectSnapshot(resolve(context.cwd, snapshotPath));
  if (!inspected.ok) {
    error(`Cannot load '${snapshotPath}' (${inspected.error.kind}): ${inspected.error.message}`);
    return ExitCode.Failure;
  }

  print(render(inspected.issues));
  reportWarnings(inspected.warnings);
  return ExitCode.Ok;
}

export function runSummaryCommand(snapshotPath: string, context: CommandContext = defaultContext()): Promise<ExitCode> {
  return withSnapshot(snapshotPath, context, (issues) => formatSnapshotSummary(summarizeSnapshot(issues)));
}

export async function runFileCommand(
  snapshotPath: string,
  target: string,
  context: CommandContext = defaultContext(),
): Promise<ExitCode> {
  if (target.trim() === '') {
    error('Target file name cannot be empty');
    return ExitCode.Failure;
  }
  return withSnapshot(snapshotPath, context, (issues) => formatFileIssues(target, findIssuesInFile(issues, target)));
}

export function runFilesCommand(snapshotPath: string, context: CommandContext = defaultContext()): Promise<ExitCode> {
  return withSnapshot(snapshotPath, context, (issues) => formatAffectedFiles(listAffectedFiles(issues)));
}
