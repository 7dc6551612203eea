/**
 * Reads one analysis snapshot YAML file.
 *
 * Never throws. Every failure is returned as a typed load error so the
 * caller can tell a missing file from bad syntax or a wrong shape.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { SnapshotLoadErrorKind, SnapshotLoadResult } from '../../core/rounds/types.js';
import { getErrorCode, getErrorMessage } from '../../shared/utils/index.js';

function failure(kind: SnapshotLoadErrorKind, path: string, message: string): SnapshotLoadResult {
  return { ok: false, error: { kind, path, message } };
}

function readErrorKind(code: string | undefined): SnapshotLoadErrorKind {
  switch (code) {
    case 'ENOENT':
      return 'missing';
    case 'EACCES':
    case 'EPERM':
      return 'permission_denied';
    default:
      return 'unknown';
  }
}

export async function loadSnapshot(path: string): Promise<SnapshotLoadResult> {
  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (e) {
    return failure(readErrorKind(getErrorCode(e)), path, getErrorMessage(e));
  }

  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return failure('encoding', path, 'file is not valid UTF-8');
  }

  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (e) {
    return failure('syntax', path, getErrorMessage(e));
  }

  if (data === null || data === undefined) {
    return failure('empty', path, 'file is empty');
  }
  if (!Array.isArray(data)) {
    return failure('shape', path, 'top-level value must be a list of rulesets');
  }

  return { ok: true, document: data };
}
