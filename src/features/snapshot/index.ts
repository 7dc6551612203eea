/**
 * Single-snapshot queries
 */

export { inspectSnapshot, type InspectResult } from './inspect.js';
export {
  summarizeSnapshot,
  findIssuesInFile,
  listAffectedFiles,
  matchesFile,
  type SnapshotSummary,
  type SnapshotSummaryRow,
  type FileIssue,
  type AffectedFile,
} from './queries.js';
export { formatSnapshotSummary, formatFileIssues, formatAffectedFiles } from './formatter.js';
