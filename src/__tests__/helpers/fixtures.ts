/**
 * In-memory fixtures for round analysis unit tests.
 */

import type { IssueRecord, NormalizedSnapshot, ResolvedRound, Round } from '../../core/rounds/types.js';

export function makeRound(day: number, name = `round_202401${String(day).padStart(2, '0')}_120000`): Round {
  return {
    name,
    timestamp: new Date(Date.UTC(2024, 0, day, 12, 0, 0)),
    path: `/workspace/${name}`,
  };
}

export function makeRecord(
  id: string,
  incidentCount: number,
  overrides: Partial<IssueRecord> = {},
): IssueRecord {
  const filesAffected = overrides.filesAffected ?? [`/src/${id}.java`];
  return {
    id,
    description: `${id} description`,
    category: 'mandatory',
    effort: 1,
    rulesetName: 'test-ruleset',
    incidentCount,
    filesAffected,
    messages: [],
    occurrences: [],
    ...overrides,
  };
}

export function makeSnapshot(records: readonly IssueRecord[]): NormalizedSnapshot {
  return {
    totalIncidents: records.reduce((sum, r) => sum + r.incidentCount, 0),
    issues: new Map(records.map((r) => [r.id, r])),
    warnings: [],
  };
}

export const FAILED_SNAPSHOT: NormalizedSnapshot = {
  totalIncidents: null,
  issues: new Map(),
  warnings: [],
};

export function resolved(round: Round, records: readonly IssueRecord[] | null): ResolvedRound {
  return { round, snapshot: records === null ? FAILED_SNAPSHOT : makeSnapshot(records) };
}
