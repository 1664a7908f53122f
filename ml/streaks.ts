/**
 * Streaks & momentum
 *
 * Walks each group's results in time order. A streak resets to length 1
 * whenever the result differs from the previous row, and at the first
 * row of a group. Ties and blank results break the run.
 */

import type { FieldValue, GroupedSeries, Outcome, RowPatch, RowTable } from '../src/types/index.js';
import { getField, requireColumns } from '../src/table.js';
import { validateWindow } from './rolling.js';

const WIN_TOKENS = new Set(['W', 'WIN', 'WON', '1', 'TRUE']);
const LOSS_TOKENS = new Set(['L', 'LOSS', 'LOST', 'OTL', 'SOL', '0', 'FALSE']);

export const STREAK_COLUMNS = [
  'streak_type',
  'streak_length',
  'is_win_streak',
  'is_loss_streak',
  'is_hot_streak',
  'is_cold_streak',
] as const;

export function parseOutcome(value: FieldValue): Outcome | undefined {
  if (value === undefined) return undefined;
  const token = String(value).trim().toUpperCase();
  if (WIN_TOKENS.has(token)) return 'W';
  if (LOSS_TOKENS.has(token)) return 'L';
  return undefined;
}

export interface StreakOptions {
  column: string;
  /** Run length at which a streak counts as hot / cold */
  hotThreshold?: number;
}

export function streaks(table: RowTable, grouped: GroupedSeries, options: StreakOptions): RowPatch {
  const { column, hotThreshold = 3 } = options;
  requireColumns(table, [column], 'streaks');
  validateWindow(hotThreshold, 'hotThreshold');

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    let current: Outcome | undefined;
    let length = 0;

    for (const entry of entries) {
      const outcome = parseOutcome(getField(table.rows[entry.index], column));
      if (outcome === undefined) {
        current = undefined;
        length = 0;
      } else if (outcome === current) {
        length++;
      } else {
        current = outcome;
        length = 1;
      }

      const isWin = current === 'W';
      const isLoss = current === 'L';
      patch.set(entry.index, {
        streak_type: isWin ? 1 : isLoss ? -1 : 0,
        streak_length: length,
        is_win_streak: isWin ? 1 : 0,
        is_loss_streak: isLoss ? 1 : 0,
        is_hot_streak: isWin && length >= hotThreshold ? 1 : 0,
        is_cold_streak: isLoss && length >= hotThreshold ? 1 : 0,
      });
    }
  }
  return patch;
}

export interface MomentumOptions {
  column: string;
  window?: number;
  outputColumn?: string;
}

/**
 * Share of wins over the last `window` rows ending at the current row.
 * Rows with an unknown result count toward the window but not as wins.
 */
export function momentum(table: RowTable, grouped: GroupedSeries, options: MomentumOptions): RowPatch {
  const { column, window = 10, outputColumn = 'momentum_score' } = options;
  requireColumns(table, [column], 'momentum');
  validateWindow(window);

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    const wins = entries.map(e => (parseOutcome(getField(table.rows[e.index], column)) === 'W' ? 1 : 0));
    for (let i = 0; i < entries.length; i++) {
      const start = Math.max(0, i - window + 1);
      let count = 0;
      for (let j = start; j <= i; j++) count += wins[j];
      patch.set(entries[i].index, { [outputColumn]: count / (i - start + 1) });
    }
  }
  return patch;
}
