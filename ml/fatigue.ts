/**
 * Rest & Fixture Congestion
 *
 * Tracks the schedule load of each team as its games are replayed in
 * time order.
 *
 * Features generated:
 * - rest_days: whole days since the team's previous game (default for the first game)
 * - is_back_to_back: 1 when rest_days <= 1
 * - games_last_<n>d: earlier games inside the congestion window (7 days by default)
 */

import type { FieldValue, GroupedSeries, RowPatch, RowTable } from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { DAY_MS, daysBetween } from './grouping.js';

export interface RestFeatures {
  restDays: number;
  isBackToBack: boolean;
  gamesInWindow: number;
}

export interface RestOptions {
  /** rest_days reported for a team's first game */
  firstGameRestDays?: number;
  congestionWindowDays?: number;
}

export function restColumns(congestionWindowDays = 7): string[] {
  return ['rest_days', 'is_back_to_back', `games_last_${congestionWindowDays}d`];
}

/**
 * Schedule state for one team. Features are read before the game is
 * recorded, so a game never counts toward its own congestion.
 */
export class RestTracker {
  private lastGame: number | null = null;
  private recent: number[] = [];

  constructor(
    private readonly firstGameRestDays: number = 3,
    private readonly congestionWindowDays: number = 7,
  ) {}

  getFeatures(gameTime: number): RestFeatures {
    const restDays = this.lastGame === null
      ? this.firstGameRestDays
      : daysBetween(this.lastGame, gameTime);

    const windowStart = gameTime - this.congestionWindowDays * DAY_MS;
    const gamesInWindow = this.recent.filter(t => t >= windowStart).length;

    return {
      restDays,
      isBackToBack: restDays <= 1,
      gamesInWindow,
    };
  }

  recordGame(gameTime: number): void {
    this.lastGame = gameTime;
    this.recent.push(gameTime);
    // Drop games that can no longer fall inside the window
    const cutoff = gameTime - this.congestionWindowDays * DAY_MS;
    this.recent = this.recent.filter(t => t >= cutoff);
  }
}

export function restDays(_table: RowTable, grouped: GroupedSeries, options: RestOptions = {}): RowPatch {
  const { firstGameRestDays = 3, congestionWindowDays = 7 } = options;
  if (grouped.ordering !== 'timestamp') {
    throw new InvalidOptionError('timestampColumn', 'rest days need series ordered by a timestamp column');
  }
  if (!(firstGameRestDays >= 0)) {
    throw new InvalidOptionError('firstGameRestDays', `must be >= 0, got ${firstGameRestDays}`);
  }
  if (!(congestionWindowDays > 0)) {
    throw new InvalidOptionError('congestionWindowDays', `must be positive, got ${congestionWindowDays}`);
  }

  const [restColumn, backToBackColumn, congestionColumn] = restColumns(congestionWindowDays);
  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    const tracker = new RestTracker(firstGameRestDays, congestionWindowDays);
    for (const entry of entries) {
      // Timestamp-ordered groups only hold rows with a parsed time
      const time = entry.time ?? 0;
      const features = tracker.getFeatures(time);
      patch.set(entry.index, {
        [restColumn]: features.restDays,
        [backToBackColumn]: features.isBackToBack ? 1 : 0,
        [congestionColumn]: features.gamesInWindow,
      });
      tracker.recordGame(time);
    }
  }
  return patch;
}
