/**
 * Only immediate subdirectories are considered. A subdirectory whose name
 * does not embed a valid round timestamp is skipped with a warning.
 */

import { readdirSync, statSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import { compareRounds, parseRoundName } from '../../core/rounds/round-name.js';
import type { AnalysisWarning, Round } from '../../core/rounds/types.js';
import { createLogger, getErrorCode, getErrorMessage } from '../../shared/utils/index.js';

const log = createLogger('round-locator');

export interface RoundLocation {
  /** Rounds ascending by timestamp, ties broken by name */
  readonly rounds: readonly Round[];
  readonly warnings: readonly AnalysisWarning[];
}

function readWorkspaceEntries(workspaceRoot: string): { entries: Dirent[] } | { warning: AnalysisWarning | null } {
  try {
    return { entries: readdirSync(workspaceRoot, { withFileTypes: true }) };
  } catch (e) {
    if (getErrorCode(e) === 'ENOENT') {
      log.debug(`Workspace ${workspaceRoot} does not exist`);
      return { warning: null };
    }
    return {
      warning: {
        kind: 'workspace_unreadable',
        source: workspaceRoot,
        message: `cannot read workspace: ${getErrorMessage(e)}`,
      },
    };
  }
}

/** Directories and symbolic links to directories; a link that cannot be resolved is warned about */
function isDirectoryEntry(workspaceRoot: string, entry: Dirent, warnings: AnalysisWarning[]): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;

  const path = join(workspaceRoot, entry.name);
  try {
    return statSync(path).isDirectory();
  } catch (e) {
    warnings.push({
      kind: 'directory_skipped',
      source: path,
      message: `cannot resolve symbolic link: ${getErrorMessage(e)}`,
    });
    return false;
  }
}

export function locateRounds(workspaceRoot: string): RoundLocation {
  const read = readWorkspaceEntries(workspaceRoot);
  if ('warning' in read) {
    return { rounds: [], warnings: read.warning ? [read.warning] : [] };
  }

  const rounds: Round[] = [];
  const warnings: AnalysisWarning[] = [];
  const entries = [...read.entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (!isDirectoryEntry(workspaceRoot, entry, warnings)) continue;
    const { name } = entry;
    const parsed = parseRoundName(name);
    if (!parsed.ok) {
      warnings.push({
        kind: 'directory_skipped',
        source: join(workspaceRoot, name),
        message: parsed.reason === 'no_timestamp'
          ? 'directory name has no round timestamp'
          : 'directory name has an invalid round timestamp',
      });
      continue;
    }
    rounds.push({ name, timestamp: parsed.timestamp, path: join(workspaceRoot, name) });
  }

  rounds.sort(compareRounds);
  log.debug(`Found ${rounds.length} round(s) in ${workspaceRoot}`);
  return { rounds, warnings };
}
