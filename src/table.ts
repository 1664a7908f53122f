/**
 * Row table helpers
 *
 * Tables are immutable: applying a patch returns a new table whose rows
 * are copies with the patched fields added.
 */

import type { FieldValue, Row, RowPatch, RowTable } from './types/index.js';
import { InvalidOptionError, UnknownColumnError } from './errors.js';

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Build a table from plain rows. Columns are the union of row keys in
 * first-seen order unless given explicitly.
 */
export function createTable(rows: readonly Row[], columns?: readonly string[]): RowTable {
  if (columns) {
    return { columns: [...columns], rows: [...rows] };
  }
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return { columns: [...seen], rows: [...rows] };
}

export function hasColumn(table: RowTable, column: string): boolean {
  return table.columns.includes(column);
}

export function requireColumns(table: RowTable, columns: readonly string[], requiredBy?: string): void {
  for (const column of columns) {
    if (!hasColumn(table, column)) {
      throw new UnknownColumnError(column, table.columns, requiredBy);
    }
  }
}

export function getField(row: Row, column: string): FieldValue {
  return Object.prototype.hasOwnProperty.call(row, column) ? row[column] : undefined;
}

/**
 * Numeric value of a cell, or undefined for blanks and non-numeric text.
 */
export function toNumber(value: FieldValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return undefined;
  return Number(trimmed);
}

export function numericField(row: Row, column: string): number | undefined {
  return toNumber(getField(row, column));
}

/**
 * Apply a pass's patch. Only new columns may be written: patching a
 * column that is already in the table is rejected.
 */
export function applyPatches(table: RowTable, patch: RowPatch, produces?: readonly string[]): RowTable {
  const added: string[] = [];
  const existing = new Set(table.columns);

  const declare = (column: string) => {
    if (existing.has(column)) {
      throw new InvalidOptionError(column, 'would overwrite an existing column');
    }
    existing.add(column);
    added.push(column);
  };

  for (const column of produces ?? []) declare(column);
  for (const fields of patch.values()) {
    for (const column of Object.keys(fields)) {
      if (!existing.has(column)) declare(column);
      else if (!added.includes(column)) {
        throw new InvalidOptionError(column, 'would overwrite an existing column');
      }
    }
  }

  const rows = table.rows.map((row, index) => {
    const fields = patch.get(index);
    return fields ? { ...row, ...fields } : row;
  });

  return { columns: [...table.columns, ...added], rows };
}
