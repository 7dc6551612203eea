/**
 * Groups keep the order in which issues were first encountered.
 * Nothing is ranked.
 */

import type { HighImpactThresholds, PersistentIssue, Recommendations } from './types.js';
import { assertNonNegativeInteger } from './errors.js';

function addToGroup(groups: Map<string, string[]>, key: string, id: string): void {
  const group = groups.get(key);
  if (group) {
    group.push(id);
    return;
  }
  groups.set(key, [id]);
}

export function isHighImpact(issue: PersistentIssue, thresholds: HighImpactThresholds): boolean {
  return issue.latest.incidentCount >= thresholds.minIncidents
    || issue.latest.filesAffected.length >= thresholds.minFiles;
}

export function buildRecommendations(
  persistentIssues: ReadonlyMap<string, PersistentIssue>,
  thresholds: HighImpactThresholds,
): Recommendations {
  assertNonNegativeInteger('highImpact.minIncidents', thresholds.minIncidents);
  assertNonNegativeInteger('highImpact.minFiles', thresholds.minFiles);

  const byCategory = new Map<string, string[]>();
  const byEffort = new Map<string, string[]>();
  const highImpact: string[] = [];

  for (const [id, issue] of persistentIssues) {
    addToGroup(byCategory, issue.latest.category, id);
    addToGroup(byEffort, String(issue.latest.effort), id);
    if (isHighImpact(issue, thresholds)) {
      highImpact.push(id);
    }
  }

  return { byCategory, byEffort, highImpact };
}
