/**
 * Round directory name parsing.
 *
 * A round directory embeds `round_YYYYMMDD_HHMMSS` somewhere in its name.
 * Timestamps are read as UTC so results do not depend on the host timezone.
 */

import { ROUND_MARKER } from '../../shared/constants.js';

export type RoundNameParseResult =
  | { readonly ok: true; readonly timestamp: Date }
  | { readonly ok: false; readonly reason: 'no_timestamp' | 'invalid_timestamp' };

const ROUND_NAME_PATTERN = new RegExp(
  `${ROUND_MARKER}(\\d{4})(\\d{2})(\\d{2})_(\\d{2})(\\d{2})(\\d{2})`,
);

export function parseRoundName(name: string): RoundNameParseResult {
  const match = ROUND_NAME_PATTERN.exec(name);
  if (!match) {
    return { ok: false, reason: 'no_timestamp' };
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map((part) => parseInt(part, 10));
  if (
    year === undefined || month === undefined || day === undefined
    || hour === undefined || minute === undefined || second === undefined
  ) {
    return { ok: false, reason: 'no_timestamp' };
  }

  if (year < 1) {
    return { ok: false, reason: 'invalid_timestamp' };
  }

  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
  const timestamp = new Date(0);
  timestamp.setUTCFullYear(year, month - 1, day);
  timestamp.setUTCHours(hour, minute, second, 0);
  // Out-of-range fields (month 13, Feb 30) roll over; reject those.
  if (
    timestamp.getUTCFullYear() !== year
    || timestamp.getUTCMonth() !== month - 1
    || timestamp.getUTCDate() !== day
    || timestamp.getUTCHours() !== hour
    || timestamp.getUTCMinutes() !== minute
    || timestamp.getUTCSeconds() !== second
  ) {
    return { ok: false, reason: 'invalid_timestamp' };
  }

  return { ok: true, timestamp };
}

/** Chronological order, ties broken by name */
export function compareRounds(
  a: { readonly name: string; readonly timestamp: Date },
  b: { readonly name: string; readonly timestamp: Date },
): number {
  const delta = a.timestamp.getTime() - b.timestamp.getTime();
  if (delta !== 0) return delta;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
