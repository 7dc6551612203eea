/**
 * JSON form of an analysis result.
 *
 * Maps become objects in insertion order (integer-like keys are reordered by
 * JSON itself) and dates become ISO-8601 strings. Nothing depends on the
 * time of the run, so the same workspace always serializes identically.
 */

import type { AnalysisResult } from '../../core/rounds/index.js';

function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  return value;
}

export function serializeAnalysisResult(result: AnalysisResult): string {
  return JSON.stringify(result, replacer, 2);
}
