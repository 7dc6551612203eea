/**
 * Keeps issues seen in enough rounds and computes their trend.
 *
 * Trend compares only the first and last observation. A dip followed by a
 * spike inside the window is not visible in the trend.
 */

import type {
  InsufficientDataError,
  IssueTimeline,
  PersistentIssue,
  Trend,
} from './types.js';
import { assertPositiveInteger } from './errors.js';

export type PersistenceClassification =
  | { readonly kind: 'classified'; readonly persistentIssues: ReadonlyMap<string, PersistentIssue> }
  | InsufficientDataError;

export function computeTrend(firstIncidentCount: number, lastIncidentCount: number): Trend {
  if (lastIncidentCount > firstIncidentCount) return 'worsening';
  if (lastIncidentCount < firstIncidentCount) return 'improving';
  return 'stable';
}

function toPersistentIssue(timeline: IssueTimeline): PersistentIssue | null {
  const first = timeline.entries[0];
  const last = timeline.entries[timeline.entries.length - 1];
  if (!first || !last) return null;

  return {
    id: timeline.id,
    timeline,
    persistence: timeline.entries.length,
    latest: last.record,
    firstIncidentCount: first.record.incidentCount,
    lastIncidentCount: last.record.incidentCount,
    trend: computeTrend(first.record.incidentCount, last.record.incidentCount),
  };
}

/**
 * Classify timelines by persistence.
 *
 * @param validRoundCount Number of rounds whose snapshot loaded
 * @returns Persistent issues in first-seen order, or insufficient data when
 *   fewer than `minRounds` rounds are usable
 */
export function classifyPersistence(
  timelines: ReadonlyMap<string, IssueTimeline>,
  minRounds: number,
  validRoundCount: number,
): PersistenceClassification {
  assertPositiveInteger('minRounds', minRounds);

  if (validRoundCount < minRounds) {
    return { kind: 'insufficient_data', required: minRounds, available: validRoundCount };
  }

  const persistentIssues = new Map<string, PersistentIssue>();
  for (const [id, timeline] of timelines) {
    if (timeline.entries.length < minRounds) continue;
    const issue = toPersistentIssue(timeline);
    if (issue) {
      persistentIssues.set(id, issue);
    }
  }

  return { kind: 'classified', persistentIssues };
}
