/**
 * Persistent issue analysis pipeline.
 *
 * locate rounds → load + normalize each snapshot (bounded parallelism)
 * → fold into history in round order → classify → recommend.
 *
 * Per-round and per-entry problems come back as warnings on the result.
 * Only invalid options throw (ConfigurationError), before any I/O.
 */

import { join } from 'node:path';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_HIGH_IMPACT_MIN_FILES,
  DEFAULT_HIGH_IMPACT_MIN_INCIDENTS,
  DEFAULT_MIN_ROUNDS,
  DEFAULT_SNAPSHOT_FILE,
} from '../../shared/constants.js';
import { createLogger, mapInBatches } from '../../shared/utils/index.js';
import {
  ConfigurationError,
  assertNonNegativeInteger,
  assertPositiveInteger,
  buildIssueHistory,
  buildRecommendations,
  classifyPersistence,
  compareRounds,
  normalizeLoadResult,
} from '../../core/rounds/index.js';
import type {
  AnalysisOutcome,
  AnalysisResult,
  AnalysisWarning,
  HighImpactThresholds,
  ResolvedRound,
  Round,
  SkippedRound,
  SnapshotLoader,
} from '../../core/rounds/index.js';
import { locateRounds } from '../../infra/fs/round-locator.js';
import { loadSnapshot } from '../../infra/fs/snapshot-loader.js';

const log = createLogger('analyze');

export interface AnalyzeOptions {
  /** Rounds an issue must appear in to be persistent (default: 3) */
  minRounds?: number;
  thresholds?: Partial<HighImpactThresholds>;
  /** Snapshot file name inside each round directory */
  snapshotFile?: string;
  /** Snapshots loaded at the same time (default: 4) */
  concurrency?: number;
  /** Replaces the YAML file loader, e.g. in tests */
  loader?: SnapshotLoader;
}

interface ResolvedOptions {
  minRounds: number;
  thresholds: HighImpactThresholds;
  snapshotFile: string;
  concurrency: number;
  loader: SnapshotLoader;
}

function resolveOptions(options: AnalyzeOptions): ResolvedOptions {
  const resolved: ResolvedOptions = {
    minRounds: options.minRounds ?? DEFAULT_MIN_ROUNDS,
    thresholds: {
      minIncidents: options.thresholds?.minIncidents ?? DEFAULT_HIGH_IMPACT_MIN_INCIDENTS,
      minFiles: options.thresholds?.minFiles ?? DEFAULT_HIGH_IMPACT_MIN_FILES,
    },
    snapshotFile: options.snapshotFile ?? DEFAULT_SNAPSHOT_FILE,
    concurrency: options.concurrency ?? DEFAULT_CONCURRENCY,
    loader: options.loader ?? loadSnapshot,
  };

  assertPositiveInteger('minRounds', resolved.minRounds);
  assertPositiveInteger('concurrency', resolved.concurrency);
  assertNonNegativeInteger('highImpact.minIncidents', resolved.thresholds.minIncidents);
  assertNonNegativeInteger('highImpact.minFiles', resolved.thresholds.minFiles);
  if (resolved.snapshotFile.trim() === '') {
    throw new ConfigurationError('snapshotFile must not be empty');
  }
  return resolved;
}

async function resolveRound(round: Round, options: ResolvedOptions): Promise<ResolvedRound> {
  const snapshotPath = join(round.path, options.snapshotFile);
  const loaded = await options.loader(snapshotPath);
  log.debug(`${round.name}: ${loaded.ok ? 'loaded' : `failed (${loaded.error.kind})`}`);
  return { round, snapshot: normalizeLoadResult(loaded, snapshotPath) };
}

function skippedRounds(resolved: readonly ResolvedRound[]): SkippedRound[] {
  return resolved
    .filter(({ snapshot }) => snapshot.totalIncidents === null)
    .map(({ round, snapshot }) => ({
      name: round.name,
      reason: snapshot.warnings[0]?.message ?? 'no valid snapshot found',
    }));
}

/**
 * Analyze a workspace for issues that persist across rounds.
 *
 * @param workspaceRoot Directory containing round_YYYYMMDD_HHMMSS subdirectories
 */
export async function analyze(workspaceRoot: string, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
  const resolvedOptions = resolveOptions(options);

  const location = locateRounds(workspaceRoot);
  const loaded = await mapInBatches(
    location.rounds,
    resolvedOptions.concurrency,
    (round) => resolveRound(round, resolvedOptions),
  );
  // History must be folded oldest-first; completion order is irrelevant.
  const resolved = [...loaded].sort((a, b) => compareRounds(a.round, b.round));

  const history = buildIssueHistory(resolved);
  const warnings: AnalysisWarning[] = [
    ...location.warnings,
    ...resolved.flatMap(({ snapshot }) => snapshot.warnings),
  ];

  const classification = classifyPersistence(
    history.timelines,
    resolvedOptions.minRounds,
    history.summaries.length,
  );
  const outcome: AnalysisOutcome = classification.kind === 'insufficient_data'
    ? classification
    : {
      kind: 'classified',
      persistentIssues: classification.persistentIssues,
      recommendations: buildRecommendations(classification.persistentIssues, resolvedOptions.thresholds),
    };

  log.debug(`${history.summaries.length}/${location.rounds.length} round(s) usable, ${warnings.length} warning(s)`);

  return {
    workspaceRoot,
    minRounds: resolvedOptions.minRounds,
    thresholds: resolvedOptions.thresholds,
    roundsFound: location.rounds.length,
    rounds: history.summaries,
    skippedRounds: skippedRounds(resolved),
    outcome,
    warnings,
  };
}
