/**
 * gamelog-features - Core Types
 */

import type { MalformedTimestampError } from '../errors.js';

// ─── Rows & Tables ───

/**
 * A single cell. Raw CSV input arrives as strings, derived features are
 * numbers, and `undefined` means the cell is unset.
 */
export type FieldValue = string | number | undefined;

/** One observation (one team in one game). Never mutated after creation. */
export type Row = Readonly<Record<string, FieldValue>>;

export interface RowTable {
  /** Header columns first, then feature columns in the order they were added */
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/**
 * New fields for some rows of a table, keyed by the row's position in
 * the flat table. Feature passes return patches instead of editing rows.
 */
export type RowPatch = ReadonlyMap<number, Readonly<Record<string, FieldValue>>>;

// ─── Grouped Series ───

export interface SeriesEntry {
  /** Position of the row in the flat table */
  index: number;
  row: Row;
  /** Epoch ms (timestamp ordering) or sequence number; undefined in input order */
  time: number | undefined;
}

export type OrderingKind = 'timestamp' | 'sequence' | 'input';

export interface GroupedSeries {
  /** Group column, or undefined when the whole table is one series */
  groupBy: string | undefined;
  ordering: OrderingKind;
  /** Entity key -> entries sorted ascending by time (stable) */
  groups: Map<string, SeriesEntry[]>;
  /** Rows left out of time-ordered computations */
  excluded: MalformedTimestampError[];
}

export interface GroupingOptions {
  groupBy?: string;
  timestampColumn?: string;
  sequenceColumn?: string;
}

// ─── Features ───

export type RollingStatistic = 'mean' | 'sum' | 'min' | 'max' | 'std';

/**
 * Season-level metrics use every row of the group, including games
 * played after the row. As-of metrics only use rows with time <= the
 * row's time.
 */
export type MetricScope = 'season' | 'asOf';

export type Outcome = 'W' | 'L';

// ─── Folds ───

export interface Fold {
  /** 1-based fold number */
  fold: number;
  train: Row[];
  test: Row[];
  trainSize: number;
  testSize: number;
  /** Half-open [start, end) positions in the time-sorted table */
  trainRange: [number, number];
  testRange: [number, number];
}

export interface StratifiedSplit {
  train: Row[];
  test: Row[];
  /** Class value -> [train count, test count] */
  classCounts: Map<FieldValue, [number, number]>;
}
