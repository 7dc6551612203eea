/**
 * CLI program definition
 */

import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_WORKSPACE_DIR } from '../../shared/constants.js';
import {
  runAnalyzeCommand,
  runFileCommand,
  runFilesCommand,
  runSummaryCommand,
  type AnalyzeCommandOptions,
} from './commands.js';

function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parseInt(value, 10);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('roundwatch')
    .description('Track static-analysis issues that persist across remediation rounds')
    .version('0.1.0');

  program
    .command('analyze')
    .description('Find issues that persist across round_YYYYMMDD_HHMMSS directories')
    .argument('[workspace]', 'workspace directory containing round directories', DEFAULT_WORKSPACE_DIR)
    .option('--min-rounds <n>', 'minimum rounds for an issue to be considered persistent', parseInteger)
    .option('--min-incidents <n>', 'latest incident count that marks an issue high impact', parseInteger)
    .option('--min-files <n>', 'latest affected-file count that marks an issue high impact', parseInteger)
    .option('--snapshot-file <name>', 'snapshot file name inside each round directory')
    .option('--concurrency <n>', 'number of snapshots loaded in parallel', parseInteger)
    .option('--json', 'print the analysis result as JSON')
    .option('--verbose', 'print debug diagnostics to stderr')
    .action(async (workspace: string, opts: AnalyzeCommandOptions) => {
      process.exitCode = await runAnalyzeCommand(workspace, opts);
    });

  program
    .command('summary')
    .description('List every issue in one snapshot with its file count')
    .argument('<snapshot>', 'path to a snapshot YAML file')
    .action(async (snapshot: string) => {
      process.exitCode = await runSummaryCommand(snapshot);
    });

  program
    .command('file')
    .description('Show the issues reported for one file')
    .argument('<snapshot>', 'path to a snapshot YAML file')
    .argument('<target>', 'file path, or a suffix of it such as pom.xml')
    .action(async (snapshot: string, target: string) => {
      process.exitCode = await runFileCommand(snapshot, target);
    });

  program
    .command('files')
    .description('List every file with issues and its occurrence count')
    .argument('<snapshot>', 'path to a snapshot YAML file')
    .action(async (snapshot: string) => {
      process.exitCode = await runFilesCommand(snapshot);
    });

  return program;
}
