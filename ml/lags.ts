/**
 * Lag features: `<column>_lag<k>` is the group's value k rows earlier.
 */

import type { FieldValue, GroupedSeries, RowPatch, RowTable } from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { getField, requireColumns } from '../src/table.js';

export interface LagOptions {
  column: string;
  periods: readonly number[];
}

export function lagColumnName(column: string, period: number): string {
  return `${column}_lag${period}`;
}

export function lag(table: RowTable, grouped: GroupedSeries, options: LagOptions): RowPatch {
  const { column, periods } = options;
  requireColumns(table, [column], 'lag');
  if (periods.length === 0) {
    throw new InvalidOptionError('periods', 'at least one lag period is required');
  }
  for (const k of periods) {
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidOptionError('periods', `lag periods must be positive integers, got ${k}`);
    }
  }

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    entries.forEach((entry, i) => {
      const fields: Record<string, FieldValue> = {};
      for (const k of periods) {
        fields[lagColumnName(column, k)] = i - k >= 0
          ? getField(table.rows[entries[i - k].index], column)
          : undefined;
      }
      patch.set(entry.index, fields);
    });
  }
  return patch;
}
