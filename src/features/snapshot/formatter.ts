/**
 * Text rendering for the snapshot query commands.
 */

import type { AffectedFile, FileIssue, SnapshotSummary } from './queries.js';

const RULE = '='.repeat(80);
const PREVIEW_LINES = 5;

export function formatSnapshotSummary(summary: SnapshotSummary): string {
  const lines = [
    RULE,
    'SNAPSHOT ISSUES SUMMARY',
    RULE,
    `${'Rule ID'.padEnd(40)} ${'Files'.padEnd(8)} Description`,
    '-'.repeat(80),
  ];
  for (const row of summary.issues) {
    lines.push(`${row.id.padEnd(40)} ${String(row.fileCount).padEnd(8)} ${row.description}`);
  }
  lines.push(
    RULE,
    `TOTAL: ${summary.issues.length} issues across ${summary.totalFiles} files`,
    RULE,
  );
  if (summary.issues.length === 0) {
    lines.push('No issues found in the snapshot.');
  }
  return lines.join('\n');
}

function formatCodePreview(snippet: string | null): string[] {
  if (snippet === null || snippet.trim() === '') return [];

  const snippetLines = snippet.split('\n');
  const lines = ['      Code Preview:'];
  for (const line of snippetLines.slice(0, PREVIEW_LINES)) {
    if (line.trim()) {
      lines.push(`        ${line}`);
    }
  }
  if (snippetLines.length > PREVIEW_LINES) {
    lines.push('        ... (truncated)');
  }
  return lines;
}

export function formatFileIssues(target: string, issues: readonly FileIssue[]): string {
  const lines = [RULE, `ISSUES IN FILE: ${target}`, RULE];

  if (issues.length === 0) {
    lines.push(
      `No issues found for file: ${target}`,
      '',
      "Tip: try just the file name (e.g. 'pom.xml') if the full path doesn't match",
    );
    return lines.join('\n');
  }

  issues.forEach(({ record, occurrences }, index) => {
    lines.push('', `Issue ${index + 1}: ${record.id}`);
    lines.push(`   Ruleset: ${record.rulesetName}`);
    lines.push(`   Category: ${record.category}`);
    if (record.effort !== 'unknown') {
      lines.push(`   Effort: ${record.effort}`);
    }
    lines.push(`   Description: ${record.description}`, '');

    occurrences.forEach((occurrence, occurrenceIndex) => {
      lines.push(`   Occurrence ${occurrenceIndex + 1}:`);
      lines.push(`      Line: ${occurrence.lineNumber ?? 'N/A'}`);
      lines.push(`      Message: ${occurrence.message ?? 'No message'}`);
      lines.push(...formatCodePreview(occurrence.codeSnippet), '');
    });
  });

  lines.push(RULE, `TOTAL: ${issues.length} issues found in ${target}`, RULE);
  return lines.join('\n');
}

export function formatAffectedFiles(files: readonly AffectedFile[]): string {
  const lines = [RULE, 'FILES WITH ISSUES', RULE];
  if (files.length === 0) {
    lines.push('No files with issues found.');
  }
  for (const { file, occurrenceCount } of files) {
    lines.push(`${String(occurrenceCount).padStart(3)} issues | ${file}`);
  }
  lines.push(RULE, `TOTAL: ${files.length} files have issues`, RULE);
  return lines.join('\n');
}
