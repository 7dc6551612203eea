import type {
  AnalysisResult,
  AnalysisWarning,
  ClassifiedOutcome,
  PersistentIssue,
  Recommendations,
  Trend,
} from '../../core/rounds/index.js';

const RULE = '='.repeat(80);
const SECTION_RULE = '='.repeat(50);
const THIN_RULE = '-'.repeat(40);

const TREND_LABELS: Record<Trend, string> = {
  worsening: '▲ WORSENING',
  improving: '▼ IMPROVING',
  stable: '= STABLE',
};

const SUGGESTED_ACTIONS = [
  'Review fix strategies for high-effort issues (may need manual intervention)',
  'Focus on mandatory category issues first',
  'Consider if high-impact issues need a different remediation approach',
  'Check if persistent files have complex dependencies',
];

function formatRoundSummary(result: AnalysisResult): string[] {
  const lines = ['ROUND SUMMARY:', THIN_RULE];
  for (const round of result.rounds) {
    lines.push(`${round.name}: ${round.uniqueIssues} issues, ${round.totalIncidents} incidents`);
  }
  for (const skipped of result.skippedRounds) {
    lines.push(`${skipped.name}: skipped (${skipped.reason})`);
  }
  return lines;
}

export function formatPersistentIssue(issue: PersistentIssue): string[] {
  const { latest } = issue;
  const lines = [
    `Issue: ${issue.id}`,
    `   Description: ${latest.description}`,
    `   Category: ${latest.category}`,
    `   Effort Level: ${latest.effort}`,
    `   Ruleset: ${latest.rulesetName}`,
    `   Persistence: ${issue.persistence} rounds`,
    '   History:',
  ];

  for (const entry of issue.timeline.entries) {
    lines.push(`      ${entry.round.name}: ${entry.record.incidentCount} incidents, ${entry.record.filesAffected.length} files`);
  }

  lines.push('   Current Files Affected:');
  for (const file of [...latest.filesAffected].sort()) {
    lines.push(`      - ${file}`);
  }

  lines.push(`   Trend: ${TREND_LABELS[issue.trend]} (${issue.firstIncidentCount} → ${issue.lastIncidentCount} incidents)`);
  return lines;
}

export function formatRecommendations(
  recommendations: Recommendations,
  persistentIssues: ReadonlyMap<string, PersistentIssue>,
): string[] {
  const lines = ['RECOMMENDATIONS:', SECTION_RULE];

  lines.push(`1. High Impact Issues (${recommendations.highImpact.length} found):`);
  for (const id of recommendations.highImpact) {
    const issue = persistentIssues.get(id);
    if (!issue) continue;
    lines.push(`   - ${id}: ${issue.latest.incidentCount} incidents, ${issue.latest.filesAffected.length} files`);
  }

  lines.push('', '2. By Category:');
  for (const [category, ids] of recommendations.byCategory) {
    lines.push(`   - ${category}: ${ids.length} issues`);
  }

  lines.push('', '3. By Effort Level:');
  for (const [effort, ids] of recommendations.byEffort) {
    lines.push(`   - Level ${effort}: ${ids.length} issues`);
  }

  lines.push('', '4. Suggested Actions:');
  for (const action of SUGGESTED_ACTIONS) {
    lines.push(`   - ${action}`);
  }
  return lines;
}

function formatClassified(outcome: ClassifiedOutcome, minRounds: number): string[] {
  const { persistentIssues } = outcome;
  if (persistentIssues.size === 0) {
    return [
      'No persistent issues found.',
      `All issues were resolved within ${minRounds - 1} rounds.`,
    ];
  }

  const lines = [
    'PERSISTENT ISSUES DETECTED:',
    RULE,
    `Found ${persistentIssues.size} issues persisting ${minRounds}+ rounds`,
    '',
  ];
  for (const issue of persistentIssues.values()) {
    lines.push(...formatPersistentIssue(issue), '');
  }
  lines.push(...formatRecommendations(outcome.recommendations, persistentIssues));
  return lines;
}

export function formatAnalysisReport(result: AnalysisResult): string {
  const lines = [
    RULE,
    'PERSISTENT ISSUES ANALYSIS',
    RULE,
    `Workspace: ${result.workspaceRoot}`,
    `Rounds analyzed: ${result.rounds.length} of ${result.roundsFound}`,
    `Persistence threshold: ${result.minRounds}+ rounds`,
    '',
    ...formatRoundSummary(result),
    '',
  ];

  if (result.outcome.kind === 'insufficient_data') {
    lines.push(
      `Need at least ${result.outcome.required} rounds to analyze persistence.`,
      `Found ${result.outcome.available} usable round(s) in workspace.`,
    );
  } else {
    lines.push(...formatClassified(result.outcome, result.minRounds));
  }

  return lines.join('\n');
}

export function formatWarning(warning: AnalysisWarning): string {
  return `${warning.source}: ${warning.message}`;
}
