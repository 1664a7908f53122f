/**
 * Train / test partitioning
 *
 * timeSeriesSplits: expanding-window folds over the time-sorted table. The
 * test slice has a fixed size and moves forward; the training slice is
 * everything before it, so no test row ever precedes a training row.
 *
 * stratifiedSplit: one random split that keeps each class's share.
 */

import type { FieldValue, Fold, Row, RowTable, StratifiedSplit } from '../src/types/index.js';
import { InsufficientDataError, InvalidOptionError } from '../src/errors.js';
import { createConsoleLogger, type Logger } from '../src/logger.js';
import { getField, requireColumns } from '../src/table.js';
import { ALL_ROWS_KEY, groupSeries } from '../ml/grouping.js';
import { mulberry32, shuffle } from './random.js';

export interface TimeSeriesSplitOptions {
  timestampColumn: string;
  nSplits?: number;
  /** Share of the table in each test slice */
  testFraction?: number;
}

function validateFraction(testFraction: number): void {
  if (!(testFraction > 0 && testFraction < 1)) {
    throw new InvalidOptionError('testFraction', `must be in (0, 1), got ${testFraction}`);
  }
}

export function timeSeriesSplits(
  table: RowTable,
  options: TimeSeriesSplitOptions,
  logger: Logger = createConsoleLogger('splits'),
): Fold[] {
  const { timestampColumn, nSplits = 5, testFraction = 0.2 } = options;
  requireColumns(table, [timestampColumn], 'timeSeriesSplits');
  if (!Number.isInteger(nSplits) || nSplits < 1) {
    throw new InvalidOptionError('nSplits', `must be a positive integer, got ${nSplits}`);
  }
  validateFraction(testFraction);

  // Rows with an unparseable timestamp are left out (and reported) by the grouper
  const grouped = groupSeries(table, { timestampColumn }, logger);
  const sorted: Row[] = (grouped.groups.get(ALL_ROWS_KEY) ?? []).map(e => e.row);

  const total = sorted.length;
  const testSize = Math.floor(total * testFraction);
  if (testSize === 0) {
    throw new InsufficientDataError(
      `${total} row(s) give an empty test slice at testFraction ${testFraction}`,
      Math.ceil(1 / testFraction),
      total,
      { testFraction },
    );
  }
  if (total < testSize * nSplits) {
    throw new InsufficientDataError(
      `${nSplits} folds of ${testSize} test rows need ${testSize * nSplits} rows, got ${total}`,
      testSize * nSplits,
      total,
      { nSplits, testSize },
    );
  }

  logger.info(`Generating ${nSplits} expanding-window folds (${total} rows, ${testSize} per test slice)`);

  const folds: Fold[] = [];
  for (let i = 0; i < nSplits; i++) {
    const trainEnd = total - testSize * (nSplits - i);
    const testEnd = trainEnd + testSize;
    const train = sorted.slice(0, trainEnd);
    const test = sorted.slice(trainEnd, testEnd);

    if (train.length === 0) {
      logger.warn(`Fold ${i + 1} has an empty training slice`);
    }

    folds.push({
      fold: i + 1,
      train,
      test,
      trainSize: train.length,
      testSize: test.length,
      trainRange: [0, trainEnd],
      testRange: [trainEnd, testEnd],
    });
  }
  return folds;
}

export interface StratifiedSplitOptions {
  targetColumn: string;
  testFraction?: number;
  seed?: number;
}

export function stratifiedSplit(
  table: RowTable,
  options: StratifiedSplitOptions,
  logger: Logger = createConsoleLogger('splits'),
): StratifiedSplit {
  const { targetColumn, testFraction = 0.2, seed = 42 } = options;
  requireColumns(table, [targetColumn], 'stratifiedSplit');
  validateFraction(testFraction);
  if (!Number.isInteger(seed)) {
    throw new InvalidOptionError('seed', `must be an integer, got ${seed}`);
  }

  // Map keeps classes in first-appearance order
  const classes = new Map<FieldValue, Row[]>();
  for (const row of table.rows) {
    const value = getField(row, targetColumn);
    const key = typeof value === 'string' ? value.trim() : value;
    let rows = classes.get(key);
    if (!rows) {
      rows = [];
      classes.set(key, rows);
    }
    rows.push(row);
  }

  const rng = mulberry32(seed);
  const train: Row[] = [];
  const test: Row[] = [];
  const classCounts = new Map<FieldValue, [number, number]>();

  for (const [value, rows] of classes) {
    const shuffled = shuffle([...rows], rng);
    const splitAt = Math.floor(rows.length * (1 - testFraction));
    train.push(...shuffled.slice(0, splitAt));
    test.push(...shuffled.slice(splitAt));
    classCounts.set(value, [splitAt, rows.length - splitAt]);
  }

  logger.info(`Stratified split on ${targetColumn}: train ${train.length}, test ${test.length} (${classes.size} classes)`);
  return { train, test, classCounts };
}
