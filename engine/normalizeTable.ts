// engine/normalizeTable.ts
//
// Turns a raw table into the canonical table every later stage works on.
// Pure: no I/O, no failure path, and normalizing twice equals normalizing once.

import type { CanonicalRow, NormalizedTable, RawTable } from './types';
import { normalizeHeaderName, toSafeTrimmedString } from './normalizeFields';
import { COLUMN_FLOOR, COLUMN_MAC, COLUMN_SERIAL, COLUMN_WAP_HOSTNAME } from './constants';

/**
 * Fold header names and make them unique. A repeated name keeps its first
 * position; later copies become "name (2)", "name (3)", ...
 */
function normalizeColumns(raw: RawTable['columns']): string[] {
  const seen = new Map<string, number>();
  const columns: string[] = [];

  raw.forEach((cell, index) => {
    const base = normalizeHeaderName(cell, index + 1);
    const count = (seen.get(base) ?? 0) + 1;
    seen.set(base, count);

    let name = count === 1 ? base : `${base} (${count})`;
    while (count > 1 && seen.has(name)) {
      name = `${name} (${count})`;
    }
    if (count > 1) seen.set(name, 1);
    columns.push(name);
  });

  return columns;
}

export function normalizeTable(raw: RawTable): NormalizedTable {
  const columns = normalizeColumns(raw.columns);
  const width = columns.length;

  const rows = raw.rows.map((row) => {
    const out: string[] = new Array<string>(width);
    for (let i = 0; i < width; i++) {
      out[i] = toSafeTrimmedString(row[i]);
    }
    return out;
  });

  return { columns, rows };
}

/**
 * Project the canonical table into typed rows for validation and execution.
 * row_number is the 1-based data row (header excluded).
 */
export function toCanonicalRows(table: NormalizedTable): CanonicalRow[] {
  const index = (name: string) => table.columns.indexOf(name);
  const floorIdx = index(COLUMN_FLOOR);
  const hostIdx = index(COLUMN_WAP_HOSTNAME);
  const serialIdx = index(COLUMN_SERIAL);
  const macIdx = index(COLUMN_MAC);

  const cell = (row: string[], idx: number): string => (idx === -1 ? '' : row[idx] ?? '');

  return table.rows.map((row, i) => ({
    row_number: i + 1,
    floor_number: cell(row, floorIdx),
    wap_hostname: cell(row, hostIdx),
    serial_number: cell(row, serialIdx),
    mac_address: cell(row, macIdx)
  }));
}
