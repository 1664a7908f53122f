/**
 * CSV game log -> RowTable
 *
 * The header row gives the columns. Cells stay strings (the feature code
 * parses numbers where it needs them); empty cells are left unset.
 */

import { readFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import type { FieldValue, Row, RowTable } from '../src/types/index.js';
import { InvalidOptionError } from '../src/errors.js';
import { createTable } from '../src/table.js';

function toCells(record: unknown): string[] {
  return Array.isArray(record) ? record.map(cell => String(cell)) : [];
}

export function parseTable(csv: string): RowTable {
  const records: unknown = parse(csv, {
    bom: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (!Array.isArray(records) || records.length === 0) {
    return createTable([], []);
  }

  const [header, ...body] = records.map(toCells);
  const seen = new Set<string>();
  for (const column of header) {
    if (column === '') throw new InvalidOptionError('header', 'blank column name');
    if (seen.has(column)) throw new InvalidOptionError('header', `duplicate column "${column}"`);
    seen.add(column);
  }

  const rows: Row[] = body.map(cells => {
    const row: Record<string, FieldValue> = {};
    header.forEach((column, i) => {
      const cell = cells[i];
      if (cell !== undefined && cell !== '') row[column] = cell;
    });
    return row;
  });

  return createTable(rows, header);
}

export async function loadTable(path: string): Promise<RowTable> {
  const content = await readFile(path, 'utf-8');
  return parseTable(content);
}
