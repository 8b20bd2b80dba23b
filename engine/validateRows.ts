// engine/validateRows.ts
// Row validation against the inventory snapshot, and the all-or-none gate.
//
// Check order per row (first disqualifying issue wins, one issue per row):
//   1) serial present
//   2) serial known to the inventory (exact, case-sensitive)
//   3) MAC, when given, canonicalizes to six hex pairs

import { ErrorCodes } from './errorCodes';
import {
  COLUMN_MAC,
  COLUMN_SERIAL,
  MSG_MAC_INVALID,
  MSG_SERIAL_BLANK,
  MSG_SERIAL_NOT_FOUND
} from './constants';
import { isCanonicalMac, normalizeMacAddress } from './normalizeFields';
import { toCanonicalRows } from './normalizeTable';
import type {
  CanonicalRow,
  InventorySnapshot,
  Issue,
  NormalizedTable
} from './types';

export function validateRow(row: CanonicalRow, snapshot: InventorySnapshot): Issue | null {
  const serial = row.serial_number.trim();

  if (!serial) {
    return {
      row: row.row_number,
      field: COLUMN_SERIAL,
      value: '',
      message: MSG_SERIAL_BLANK,
      code: ErrorCodes.SERIAL_BLANK
    };
  }

  if (!snapshot.has(serial)) {
    return {
      row: row.row_number,
      field: COLUMN_SERIAL,
      value: serial,
      message: MSG_SERIAL_NOT_FOUND,
      code: ErrorCodes.SERIAL_NOT_IN_INVENTORY
    };
  }

  const mac = normalizeMacAddress(row.mac_address);
  if (mac && !isCanonicalMac(mac)) {
    return {
      row: row.row_number,
      field: COLUMN_MAC,
      value: row.mac_address,
      message: MSG_MAC_INVALID,
      code: ErrorCodes.MAC_FORMAT_INVALID
    };
  }

  return null;
}

/**
 * Validate every row; never stops at the first bad one.
 * Issues come back in row order.
 */
export function validateRows(
  rows: readonly CanonicalRow[],
  snapshot: InventorySnapshot
): Issue[] {
  const issues: Issue[] = [];
  for (const row of rows) {
    const issue = validateRow(row, snapshot);
    if (issue) issues.push(issue);
  }
  return issues;
}

// ------------------------------------------------------------
// All-or-none gate
// ------------------------------------------------------------

/**
 * A batch that passed validation with zero issues.
 * Only validateBatch hands these out; the executor refuses anything else.
 */
export interface ValidatedBatch {
  readonly table: NormalizedTable;
  readonly rows: readonly CanonicalRow[];
  readonly snapshot: InventorySnapshot;
  readonly issues: readonly [];
}

export type BatchValidation =
  | { ok: true; batch: ValidatedBatch }
  | { ok: false; issues: Issue[] };

export function validateBatch(
  table: NormalizedTable,
  snapshot: InventorySnapshot
): BatchValidation {
  const rows = toCanonicalRows(table);
  const issues = validateRows(rows, snapshot);

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  return { ok: true, batch: { table, rows, snapshot, issues: [] } };
}
