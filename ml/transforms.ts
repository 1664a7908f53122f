/**
 * Row-wise transforms
 *
 * Each output depends only on the row itself, except the time-decay
 * weight (relative to the latest date in the table) and min-max
 * normalization (relative to the column's range, over the whole table
 * unless bounds are given).
 */

import type { FieldValue, Row, RowPatch, RowTable } from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { getField, numericField, requireColumns } from '../src/table.js';
import { DAY_MS, parseTimestamp } from './grouping.js';

type Patch = Map<number, Record<string, FieldValue>>;

export interface WinPctOptions {
  winsColumn: string;
  gamesPlayedColumn: string;
  outputColumn?: string;
}

/** wins / games played, 0 for a team that has not played */
export function winPct(table: RowTable, options: WinPctOptions): RowPatch {
  const { winsColumn, gamesPlayedColumn, outputColumn = 'win_pct' } = options;
  requireColumns(table, [winsColumn, gamesPlayedColumn], 'winPct');

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const games = numericField(row, gamesPlayedColumn) ?? 0;
    const wins = numericField(row, winsColumn) ?? 0;
    patch.set(index, { [outputColumn]: games > 0 ? wins / games : 0 });
  });
  return patch;
}

export interface RateOptions {
  numerator: string;
  denominator: string;
  /** Defaults to `<numerator>_per_<denominator>` */
  outputColumn?: string;
}

export function rateColumnName(options: RateOptions): string {
  return options.outputColumn ?? `${options.numerator}_per_${options.denominator}`;
}

/** numerator / denominator; unset when either is missing or the denominator is 0 */
export function rateStat(table: RowTable, options: RateOptions): RowPatch {
  const { numerator, denominator } = options;
  requireColumns(table, [numerator, denominator], 'rateStat');
  const output = rateColumnName(options);

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const top = numericField(row, numerator);
    const bottom = numericField(row, denominator);
    patch.set(index, { [output]: top !== undefined && bottom !== undefined && bottom !== 0 ? top / bottom : undefined });
  });
  return patch;
}

export interface Bounds {
  min: number;
  max: number;
}

/** Smallest and largest numeric value of a column, undefined when it has none */
export function minMaxBounds(rows: readonly Row[], column: string): Bounds | undefined {
  let bounds: Bounds | undefined;
  for (const row of rows) {
    const value = numericField(row, column);
    if (value === undefined) continue;
    bounds = bounds
      ? { min: Math.min(bounds.min, value), max: Math.max(bounds.max, value) }
      : { min: value, max: value };
  }
  return bounds;
}

export interface NormalizeOptions {
  column: string;
  /** Defaults to `<column>_norm` */
  outputColumn?: string;
  /**
   * Range to scale by. Pass the bounds of a training slice to scale a
   * test slice without reading it; defaults to the whole table's range.
   */
  bounds?: Bounds;
}

export function normalizeColumnName(options: NormalizeOptions): string {
  return options.outputColumn ?? `${options.column}_norm`;
}

/**
 * (value - min) / (max - min). A constant column scales to 0. Values
 * outside given bounds are not clipped.
 */
export function minMaxNormalize(table: RowTable, options: NormalizeOptions): RowPatch {
  const { column } = options;
  requireColumns(table, [column], 'minMaxNormalize');
  const bounds = options.bounds ?? minMaxBounds(table.rows, column);
  if (bounds && !(bounds.max >= bounds.min)) {
    throw new InvalidOptionError('bounds', `max must be >= min, got [${bounds.min}, ${bounds.max}]`);
  }
  const output = normalizeColumnName(options);

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const value = numericField(row, column);
    if (value === undefined || bounds === undefined) {
      patch.set(index, { [output]: undefined });
      return;
    }
    const range = bounds.max - bounds.min;
    patch.set(index, { [output]: range > 0 ? (value - bounds.min) / range : 0 });
  });
  return patch;
}

export interface InteractionOptions {
  left: string;
  right: string;
  /** Defaults to `<left>_x_<right>` */
  outputColumn?: string;
}

export function interactionColumnName(options: InteractionOptions): string {
  return options.outputColumn ?? `${options.left}_x_${options.right}`;
}

export function interaction(table: RowTable, options: InteractionOptions): RowPatch {
  const { left, right } = options;
  requireColumns(table, [left, right], 'interaction');
  const output = interactionColumnName(options);

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const a = numericField(row, left);
    const b = numericField(row, right);
    patch.set(index, { [output]: a !== undefined && b !== undefined ? a * b : undefined });
  });
  return patch;
}

export interface PolynomialOptions {
  column: string;
  degree?: number;
}

/** `<column>_pow2` .. `<column>_pow<degree>` */
export function polynomialColumnNames(column: string, degree = 2): string[] {
  const names: string[] = [];
  for (let d = 2; d <= degree; d++) names.push(`${column}_pow${d}`);
  return names;
}

export function polynomial(table: RowTable, options: PolynomialOptions): RowPatch {
  const { column, degree = 2 } = options;
  requireColumns(table, [column], 'polynomial');
  if (!Number.isInteger(degree) || degree < 2) {
    throw new InvalidOptionError('degree', `must be an integer >= 2, got ${degree}`);
  }

  const patch: Patch = new Map();
  table.rows.forEach((row, index) => {
    const value = numericField(row, column);
    const fields: Record<string, FieldValue> = {};
    for (let d = 2; d <= degree; d++) {
      fields[`${column}_pow${d}`] = value !== undefined ? value ** d : undefined;
    }
    patch.set(index, fields);
  });
  return patch;
}

export interface TimeDecayOptions {
  timestampColumn: string;
  /** Per-day decay; weight = exp(-rate * days before the latest date) */
  decayRate: number;
  outputColumn?: string;
}

export function timeDecay(table: RowTable, options: TimeDecayOptions): RowPatch {
  const { timestampColumn, decayRate, outputColumn = 'time_weight' } = options;
  requireColumns(table, [timestampColumn], 'timeDecay');
  if (!(decayRate >= 0)) {
    throw new InvalidOptionError('decayRate', `must be >= 0, got ${decayRate}`);
  }

  const times = table.rows.map(row => parseTimestamp(getField(row, timestampColumn)));
  const latest = times.reduce<number | undefined>(
    (max, t) => (t !== undefined && (max === undefined || t > max) ? t : max),
    undefined,
  );

  const patch: Patch = new Map();
  times.forEach((time, index) => {
    if (time === undefined || latest === undefined) {
      patch.set(index, { [outputColumn]: undefined });
      return;
    }
    const daysAgo = Math.floor((latest - time) / DAY_MS);
    patch.set(index, { [outputColumn]: Math.exp(-decayRate * daysAgo) });
  });
  return patch;
}
