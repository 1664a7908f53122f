/**
 * Rolling window statistics
 *
 * For row i of a group the window is rows [max(0, i-window+1) .. i]: it
 * always includes the current row and shrinks at the start of a series.
 */

import type {
  FieldValue,
  GroupedSeries,
  RollingStatistic,
  RowPatch,
  RowTable,
} from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { numericField, requireColumns } from '../src/table.js';

export interface RollingOptions {
  column: string;
  window: number;
  statistic: RollingStatistic;
  outputColumn?: string;
  /** Also emit `<output>_partial` = 1 while the window is not yet full */
  flagPartial?: boolean;
}

export const ROLLING_STATISTICS: readonly RollingStatistic[] = ['mean', 'sum', 'min', 'max', 'std'];

export function rollingColumnName(column: string, statistic: RollingStatistic, window: number): string {
  return `${column}_rolling_${statistic}_${window}`;
}

/**
 * Statistic over the numeric values of a window. Undefined when empty.
 * `std` is the population standard deviation.
 */
export function computeStatistic(values: readonly number[], statistic: RollingStatistic): number | undefined {
  if (values.length === 0) return undefined;
  switch (statistic) {
    case 'sum':
      return values.reduce((a, b) => a + b, 0);
    case 'mean':
      return values.reduce((a, b) => a + b, 0) / values.length;
    case 'min':
      return Math.min(...values);
    case 'max':
      return Math.max(...values);
    case 'std': {
      const mean = values.reduce((a, b) => a + b, 0) / values.length;
      const variance = values.reduce((s, v) => s + (v - mean) ** 2, 0) / values.length;
      return Math.sqrt(variance);
    }
  }
}

export function validateWindow(window: number, option = 'window'): void {
  if (!Number.isInteger(window) || window < 1) {
    throw new InvalidOptionError(option, `must be a positive integer, got ${window}`);
  }
}

export function rolling(table: RowTable, grouped: GroupedSeries, options: RollingOptions): RowPatch {
  const { column, window, statistic, flagPartial = false } = options;
  requireColumns(table, [column], 'rolling');
  validateWindow(window);
  if (!ROLLING_STATISTICS.includes(statistic)) {
    throw new InvalidOptionError('statistic', `unknown statistic "${statistic}"`);
  }
  const output = options.outputColumn ?? rollingColumnName(column, statistic, window);

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    const values = entries.map(e => numericField(table.rows[e.index], column));

    for (let i = 0; i < entries.length; i++) {
      const start = Math.max(0, i - window + 1);
      const inWindow = values.slice(start, i + 1).filter((v): v is number => v !== undefined);

      const fields: Record<string, FieldValue> = {
        [output]: computeStatistic(inWindow, statistic),
      };
      if (flagPartial) {
        fields[`${output}_partial`] = i + 1 < window ? 1 : 0;
      }
      patch.set(entries[i].index, fields);
    }
  }
  return patch;
}
