/**
 * Round persistence tracking.
 *
 * Pure computation over already-loaded snapshots. Reading the workspace
 * and the snapshot files lives in infra/fs.
 */

export type * from './types.js';
export { ConfigurationError, assertPositiveInteger, assertNonNegativeInteger } from './errors.js';
export { parseRoundName, compareRounds, type RoundNameParseResult } from './round-name.js';
export { normalizeSnapshot, normalizeLoadResult, fileFromUri } from './normalizer.js';
export { IssueHistoryBuilder, buildIssueHistory, type IssueHistory } from './history-builder.js';
export { classifyPersistence, computeTrend, type PersistenceClassification } from './persistence-classifier.js';
export { buildRecommendations, isHighImpact } from './recommendations.js';
