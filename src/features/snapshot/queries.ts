/**
 * Queries over a single normalized snapshot.
 */

import { ConfigurationError } from '../../core/rounds/index.js';
import type { IssueRecord, IssueSet, Occurrence } from '../../core/rounds/index.js';

export interface SnapshotSummaryRow {
  readonly id: string;
  readonly fileCount: number;
  readonly description: string;
}

export interface SnapshotSummary {
  readonly issues: readonly SnapshotSummaryRow[];
  /** Distinct files across every issue */
  readonly totalFiles: number;
}

export interface FileIssue {
  readonly record: IssueRecord;
  /** Occurrences located in the target file */
  readonly occurrences: readonly Occurrence[];
}

export interface AffectedFile {
  readonly file: string;
  readonly occurrenceCount: number;
}

export function summarizeSnapshot(issues: IssueSet): SnapshotSummary {
  const rows: SnapshotSummaryRow[] = [];
  const allFiles = new Set<string>();

  for (const record of issues.values()) {
    for (const file of record.filesAffected) {
      allFiles.add(file);
    }
    rows.push({ id: record.id, fileCount: record.filesAffected.length, description: record.description });
  }

  return { issues: rows, totalFiles: allFiles.size };
}

/** True when the occurrence file is the target or ends with it (so `pom.xml` matches `/src/app/pom.xml`) */
export function matchesFile(file: string | null, target: string): boolean {
  if (file === null) return false;
  return file === target || file.endsWith(target);
}

export function findIssuesInFile(issues: IssueSet, target: string): FileIssue[] {
  if (target.trim() === '') {
    throw new ConfigurationError('Target file name cannot be empty');
  }

  const found: FileIssue[] = [];
  for (const record of issues.values()) {
    const occurrences = record.occurrences.filter((o) => matchesFile(o.file, target));
    if (occurrences.length > 0) {
      found.push({ record, occurrences });
    }
  }
  return found;
}

/** Files with at least one occurrence, sorted by path */
export function listAffectedFiles(issues: IssueSet): AffectedFile[] {
  const counts = new Map<string, number>();
  for (const record of issues.values()) {
    for (const occurrence of record.occurrences) {
      if (occurrence.file === null) continue;
      counts.set(occurrence.file, (counts.get(occurrence.file) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([file, occurrenceCount]) => ({ file, occurrenceCount }));
}
