/**
 * Temporal grouping
 *
 * Splits a flat table into one ordered series per entity. Every windowed,
 * lag, streak and rest computation reads its group through this module
 * and never trusts input order.
 */

import type {
  FieldValue,
  GroupedSeries,
  GroupingOptions,
  OrderingKind,
  RowTable,
  SeriesEntry,
} from '../src/types/index.js';
import { MalformedTimestampError } from '../src/errors.js';
import { getField, requireColumns, toNumber } from '../src/table.js';
import { silentLogger, type Logger } from '../src/logger.js';

/** Group key used when no group column is configured */
export const ALL_ROWS_KEY = '*';

export const DAY_MS = 1000 * 60 * 60 * 24;

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?)?$/;
const DMY_PATTERN = /^(\d{1,2})\/(\d{1,2})\/(\d{2}|\d{4})$/;

/**
 * Parse a timestamp cell to epoch ms.
 *
 * Accepts epoch ms numbers, ISO 8601 dates (date-only values are UTC
 * midnight) and DD/MM/YYYY or DD/MM/YY. Returns undefined for anything
 * else, including impossible calendar dates.
 */
export function parseTimestamp(value: FieldValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const text = value.trim();
  if (!text) return undefined;

  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    const [, y, m, d, hh] = iso;
    if (!validCalendarDate(Number(y), Number(m), Number(d))) return undefined;
    // Date-only strings parse as UTC; without a zone, a time is read as UTC too
    const normalized = hh !== undefined && iso[7] === undefined
      ? `${text.replace(' ', 'T')}Z`
      : text.replace(' ', 'T');
    const ms = Date.parse(normalized);
    return Number.isNaN(ms) ? undefined : ms;
  }

  const dmy = DMY_PATTERN.exec(text);
  if (dmy) {
    const day = Number(dmy[1]);
    const month = Number(dmy[2]);
    let year = Number(dmy[3]);
    if (dmy[3].length === 2) {
      year = year > 50 ? 1900 + year : 2000 + year;
    }
    if (!validCalendarDate(year, month, day)) return undefined;
    return Date.UTC(year, month - 1, day);
  }

  return undefined;
}

function validCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

/**
 * Group rows by entity and sort each group ascending by time.
 *
 * Ordering uses `timestampColumn` if given, else `sequenceColumn`, else
 * input order. Rows whose ordering value is missing or unparseable are
 * reported in `excluded` and appear in no group; they stay in the flat
 * table untouched.
 */
export function groupSeries(
  table: RowTable,
  options: GroupingOptions = {},
  logger: Logger = silentLogger,
): GroupedSeries {
  const { groupBy, timestampColumn, sequenceColumn } = options;
  const referenced = [groupBy, timestampColumn ?? sequenceColumn].filter(
    (c): c is string => c !== undefined,
  );
  requireColumns(table, referenced, 'groupSeries');

  const ordering: OrderingKind = timestampColumn ? 'timestamp' : sequenceColumn ? 'sequence' : 'input';
  const orderColumn = timestampColumn ?? sequenceColumn;

  const groups = new Map<string, SeriesEntry[]>();
  const excluded: MalformedTimestampError[] = [];

  table.rows.forEach((row, index) => {
    let time: number | undefined;
    if (orderColumn !== undefined) {
      const raw = getField(row, orderColumn);
      time = ordering === 'timestamp' ? parseTimestamp(raw) : toNumber(raw);
      if (time === undefined) {
        excluded.push(new MalformedTimestampError(index, orderColumn, raw));
        return;
      }
    }

    const key = groupBy === undefined ? ALL_ROWS_KEY : groupKey(getField(row, groupBy));
    let entries = groups.get(key);
    if (!entries) {
      entries = [];
      groups.set(key, entries);
    }
    entries.push({ index, row, time });
  });

  if (ordering !== 'input') {
    // Array.prototype.sort is stable; ties keep input order
    for (const entries of groups.values()) {
      entries.sort((a, b) => (a.time ?? 0) - (b.time ?? 0));
    }
  }

  if (excluded.length > 0) {
    logger.warn(
      `${excluded.length} row(s) excluded from time-ordered features: unparseable ${orderColumn}`,
    );
    for (const error of excluded) logger.debug(error.message);
  }
  logger.debug(`Grouped ${table.rows.length - excluded.length} rows into ${groups.size} series`);

  return { groupBy, ordering, groups, excluded };
}

function groupKey(value: FieldValue): string {
  if (value === undefined) return '';
  return typeof value === 'number' ? String(value) : value.trim();
}

/**
 * Index of the last entry whose time equals entries[i].time, i.e. the
 * end of the "as of row i" prefix. Rows sharing a timestamp are visible
 * to each other; later rows never are.
 */
export function asOfEnd(entries: readonly SeriesEntry[], i: number): number {
  const time = entries[i].time;
  if (time === undefined) return i;
  let end = i;
  while (end + 1 < entries.length && entries[end + 1].time === time) end++;
  return end;
}

/**
 * Whole days between two epoch-ms timestamps, floored.
 */
export function daysBetween(from: number, to: number): number {
  return Math.floor((to - from) / DAY_MS);
}
