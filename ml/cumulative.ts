/**
 * Running aggregates and ranks
 *
 * Both read a group's games in order and only ever look back: the value
 * at row i is built from rows 0..i of its group.
 */

import type { FieldValue, GroupedSeries, RowPatch, RowTable } from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { numericField, requireColumns } from '../src/table.js';

export type CumulativeStatistic = 'sum' | 'mean' | 'max' | 'min';

export const CUMULATIVE_STATISTICS: readonly CumulativeStatistic[] = ['sum', 'mean', 'max', 'min'];

export interface CumulativeOptions {
  column: string;
  statistic?: CumulativeStatistic;
  outputColumn?: string;
}

export function cumulativeColumnName(column: string, statistic: CumulativeStatistic = 'sum'): string {
  return `${column}_cumulative_${statistic}`;
}

/**
 * Running sum / mean / max / min of a column over the group so far,
 * the current row included. Non-numeric values are skipped; the row
 * stays unset until the group has produced a number.
 */
export function cumulative(table: RowTable, grouped: GroupedSeries, options: CumulativeOptions): RowPatch {
  const { column, statistic = 'sum' } = options;
  requireColumns(table, [column], 'cumulative');
  if (!CUMULATIVE_STATISTICS.includes(statistic)) {
    throw new InvalidOptionError('statistic', `expected one of ${CUMULATIVE_STATISTICS.join(', ')}, got "${statistic}"`);
  }
  const output = options.outputColumn ?? cumulativeColumnName(column, statistic);

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    let sum = 0;
    let count = 0;
    let max = Number.NEGATIVE_INFINITY;
    let min = Number.POSITIVE_INFINITY;

    for (const entry of entries) {
      const value = numericField(table.rows[entry.index], column);
      if (value !== undefined) {
        sum += value;
        count++;
        max = Math.max(max, value);
        min = Math.min(min, value);
      }

      let result: number | undefined;
      if (count > 0) {
        switch (statistic) {
          case 'sum': result = sum; break;
          case 'mean': result = sum / count; break;
          case 'max': result = max; break;
          case 'min': result = min; break;
        }
      }
      patch.set(entry.index, { [output]: result });
    }
  }
  return patch;
}

export interface RankOptions {
  column: string;
  /** Rank 1 is the smallest value when true, the largest otherwise */
  ascending?: boolean;
  outputColumn?: string;
}

/**
 * Rank of the row's value among its group's games so far (competition
 * ranking: ties share the best rank). Unset for non-numeric values.
 */
export function rankWithinGroup(table: RowTable, grouped: GroupedSeries, options: RankOptions): RowPatch {
  const { column, ascending = false, outputColumn = `${column}_rank` } = options;
  requireColumns(table, [column], 'rankWithinGroup');

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    const seen: number[] = [];
    for (const entry of entries) {
      const value = numericField(table.rows[entry.index], column);
      if (value === undefined) {
        patch.set(entry.index, { [outputColumn]: undefined });
        continue;
      }
      seen.push(value);
      const better = seen.filter(v => (ascending ? v < value : v > value)).length;
      patch.set(entry.index, { [outputColumn]: better + 1 });
    }
  }
  return patch;
}
