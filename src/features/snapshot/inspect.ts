/**
 * Load and normalize one snapshot file for the query commands.
 */

import { normalizeSnapshot } from '../../core/rounds/index.js';
import type {
  AnalysisWarning,
  IssueSet,
  SnapshotLoadError,
  SnapshotLoader,
} from '../../core/rounds/index.js';
import { loadSnapshot } from '../../infra/fs/snapshot-loader.js';

export type InspectResult =
  | { readonly ok: true; readonly issues: IssueSet; readonly warnings: readonly AnalysisWarning[] }
  | { readonly ok: false; readonly error: SnapshotLoadError };

export async function inspectSnapshot(path: string, loader: SnapshotLoader = loadSnapshot): Promise<InspectResult> {
  const loaded = await loader(path);
  if (!loaded.ok) {
    return { ok: false, error: loaded.error };
  }
  const normalized = normalizeSnapshot(loaded.document, path);
  return { ok: true, issues: normalized.issues, warnings: normalized.warnings };
}
