/**
 * Type definitions for round persistence tracking.
 *
 * A workspace holds one directory per remediation round. Each round's
 * snapshot is normalized into an IssueSet, issue ids are followed across
 * rounds as timelines, and timelines that span enough rounds become
 * persistent issues with a trend.
 */

/** One timestamped snapshot directory */
export interface Round {
  readonly name: string;
  readonly timestamp: Date;
  readonly path: string;
}

/** Effort as reported by the analyzer: usually a small integer, sometimes free text */
export type Effort = number | string;

/** One incident of an issue inside a round */
export interface Occurrence {
  /** Path from a `file://` location, null when the location is absent or not a file URI */
  readonly file: string | null;
  readonly lineNumber: number | null;
  readonly message: string | null;
  readonly codeSnippet: string | null;
}

/** One rule result within a single round */
export interface IssueRecord {
  readonly id: string;
  readonly description: string;
  readonly category: string;
  readonly effort: Effort;
  readonly rulesetName: string;
  readonly incidentCount: number;
  /** Distinct file paths, first-seen order */
  readonly filesAffected: readonly string[];
  /** Distinct occurrence messages, first-seen order */
  readonly messages: readonly string[];
  readonly occurrences: readonly Occurrence[];
}

/** Issue id → record for one round */
export type IssueSet = ReadonlyMap<string, IssueRecord>;

/** One observation of an issue */
export interface TimelineEntry {
  readonly round: Round;
  readonly record: IssueRecord;
}

/** Every round in which an issue id appeared, in round order. Never empty. */
export interface IssueTimeline {
  readonly id: string;
  readonly entries: readonly TimelineEntry[];
}

/** Direction of the incident count between first and last observation */
export type Trend = 'worsening' | 'improving' | 'stable';

export interface PersistentIssue {
  readonly id: string;
  readonly timeline: IssueTimeline;
  /** Number of rounds the issue was observed in */
  readonly persistence: number;
  readonly latest: IssueRecord;
  readonly firstIncidentCount: number;
  readonly lastIncidentCount: number;
  readonly trend: Trend;
}

/** Per-round statistics for rounds whose snapshot loaded */
export interface RoundSummary {
  readonly name: string;
  readonly timestamp: Date;
  readonly totalIncidents: number;
  readonly uniqueIssues: number;
}

/** A located round whose snapshot could not be used */
export interface SkippedRound {
  readonly name: string;
  readonly reason: string;
}

export type WarningKind =
  | 'directory_skipped'
  | 'workspace_unreadable'
  | 'snapshot_load_failed'
  | 'shape_mismatch'
  | 'duplicate_issue';

/** Non-fatal problem collected while running the pipeline */
export interface AnalysisWarning {
  readonly kind: WarningKind;
  /** Path or document location the warning refers to */
  readonly source: string;
  readonly message: string;
}

/** Normalized form of one snapshot */
export interface NormalizedSnapshot {
  /** null when the snapshot did not load; 0 when it loaded and was empty */
  readonly totalIncidents: number | null;
  readonly issues: IssueSet;
  readonly warnings: readonly AnalysisWarning[];
}

/** A round paired with its normalized snapshot */
export interface ResolvedRound {
  readonly round: Round;
  readonly snapshot: NormalizedSnapshot;
}

export interface HighImpactThresholds {
  /** Latest incident count at or above which an issue is high impact */
  readonly minIncidents: number;
  /** Latest affected-file count at or above which an issue is high impact */
  readonly minFiles: number;
}

export interface Recommendations {
  readonly byCategory: ReadonlyMap<string, readonly string[]>;
  readonly byEffort: ReadonlyMap<string, readonly string[]>;
  readonly highImpact: readonly string[];
}

/** Fewer usable rounds than the persistence threshold requires */
export interface InsufficientDataError {
  readonly kind: 'insufficient_data';
  readonly required: number;
  readonly available: number;
}

export interface ClassifiedOutcome {
  readonly kind: 'classified';
  readonly persistentIssues: ReadonlyMap<string, PersistentIssue>;
  readonly recommendations: Recommendations;
}

export type AnalysisOutcome = ClassifiedOutcome | InsufficientDataError;

export interface AnalysisResult {
  readonly workspaceRoot: string;
  readonly minRounds: number;
  readonly thresholds: HighImpactThresholds;
  /** Rounds found on disk, including those whose snapshot failed to load */
  readonly roundsFound: number;
  readonly rounds: readonly RoundSummary[];
  readonly skippedRounds: readonly SkippedRound[];
  readonly outcome: AnalysisOutcome;
  readonly warnings: readonly AnalysisWarning[];
}

/** A loaded snapshot: an ordered sequence of ruleset groups, not yet validated */
export type SnapshotDocument = readonly unknown[];

export type SnapshotLoadErrorKind =
  | 'missing'
  | 'permission_denied'
  | 'syntax'
  | 'shape'
  | 'encoding'
  | 'empty'
  | 'unknown';

export interface SnapshotLoadError {
  readonly kind: SnapshotLoadErrorKind;
  readonly path: string;
  readonly message: string;
}

export type SnapshotLoadResult =
  | { readonly ok: true; readonly document: SnapshotDocument }
  | { readonly ok: false; readonly error: SnapshotLoadError };

/** Reads and parses one snapshot file */
export type SnapshotLoader = (path: string) => Promise<SnapshotLoadResult>;
