/**
 * Exponentially weighted moving average
 *
 *   e[0] = x[0]
 *   e[i] = alpha * x[i] + (1 - alpha) * e[i-1]
 *
 * Restarts for every group. A row whose value is not numeric is left
 * unset and the recursion resumes from the last defined average.
 */

import type { FieldValue, GroupedSeries, RowPatch, RowTable } from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { numericField, requireColumns } from '../src/table.js';

export interface EwmaOptions {
  column: string;
  alpha?: number;
  /** alpha = 2 / (span + 1) */
  span?: number;
  outputColumn?: string;
}

export function resolveAlpha(options: { alpha?: number; span?: number }): number {
  const { alpha, span } = options;
  if (alpha !== undefined && span !== undefined) {
    throw new InvalidOptionError('alpha', 'set either alpha or span, not both');
  }
  if (span !== undefined) {
    if (!(span > 0)) throw new InvalidOptionError('span', `must be positive, got ${span}`);
    return 2 / (span + 1);
  }
  if (alpha === undefined) {
    throw new InvalidOptionError('alpha', 'alpha or span is required');
  }
  if (!(alpha > 0 && alpha <= 1)) {
    throw new InvalidOptionError('alpha', `must be in (0, 1], got ${alpha}`);
  }
  return alpha;
}

export function ewma(table: RowTable, grouped: GroupedSeries, options: EwmaOptions): RowPatch {
  requireColumns(table, [options.column], 'ewma');
  const alpha = resolveAlpha(options);
  const output = options.outputColumn ?? `${options.column}_ewma`;

  const patch = new Map<number, Record<string, FieldValue>>();
  for (const entries of grouped.groups.values()) {
    let previous: number | undefined;
    for (const entry of entries) {
      const x = numericField(table.rows[entry.index], options.column);
      if (x !== undefined) {
        previous = previous === undefined ? x : alpha * x + (1 - alpha) * previous;
        patch.set(entry.index, { [output]: previous });
      } else {
        patch.set(entry.index, { [output]: undefined });
      }
    }
  }
  return patch;
}
