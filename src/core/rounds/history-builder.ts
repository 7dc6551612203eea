/**
 * Rounds are folded strictly in chronological order. Every round whose
 * snapshot loaded appends one entry per issue id it contains; rounds that
 * failed to load add nothing. No classification happens here.
 */

import type { IssueRecord, IssueTimeline, ResolvedRound, Round, RoundSummary, TimelineEntry } from './types.js';
import { compareRounds } from './round-name.js';

/** Accumulated history across all usable rounds */
export interface IssueHistory {
  readonly timelines: ReadonlyMap<string, IssueTimeline>;
  /** One summary per round whose snapshot loaded, in round order */
  readonly summaries: readonly RoundSummary[];
}

/**
 * Incremental timeline accumulator.
 *
 * Usage:
 *   const builder = new IssueHistoryBuilder();
 *   builder.addRound({ round, snapshot });  // once per round, oldest first
 *   const history = builder.getHistory();
 */
export class IssueHistoryBuilder {
  private readonly entries = new Map<string, TimelineEntry[]>();
  private readonly summaries: RoundSummary[] = [];
  private lastRound: Round | null = null;

  /**
   * Fold one round into the history.
   * Throws if the round is older than the previously added one.
   */
  addRound(resolved: ResolvedRound): void {
    const { round, snapshot } = resolved;
    if (this.lastRound && compareRounds(this.lastRound, round) > 0) {
      throw new Error(`Round ${round.name} added after later round ${this.lastRound.name}`);
    }
    this.lastRound = round;

    if (snapshot.totalIncidents === null) {
      return;
    }

    this.summaries.push({
      name: round.name,
      timestamp: round.timestamp,
      totalIncidents: snapshot.totalIncidents,
      uniqueIssues: snapshot.issues.size,
    });

    for (const [id, record] of snapshot.issues) {
      this.appendEntry(id, round, record);
    }
  }

  private appendEntry(id: string, round: Round, record: IssueRecord): void {
    const timeline = this.entries.get(id);
    if (timeline) {
      timeline.push({ round, record });
      return;
    }
    this.entries.set(id, [{ round, record }]);
  }

  getHistory(): IssueHistory {
    const timelines = new Map<string, IssueTimeline>();
    for (const [id, entries] of this.entries) {
      timelines.set(id, { id, entries: [...entries] });
    }
    return { timelines, summaries: [...this.summaries] };
  }
}

/**
 * Build the issue history from resolved rounds.
 * Input order does not matter; rounds are sorted chronologically before folding.
 */
export function buildIssueHistory(rounds: readonly ResolvedRound[]): IssueHistory {
  const builder = new IssueHistoryBuilder();
  const ordered = [...rounds].sort((a, b) => compareRounds(a.round, b.round));
  for (const resolved of ordered) {
    builder.addRound(resolved);
  }
  return builder.getHistory();
}
