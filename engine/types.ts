// engine/types.ts
// Shared TypeScript interfaces for the AP site import engine.
import type { ErrorCode } from './errorCodes';

// ------------------------------------------------------------
// Tables
// ------------------------------------------------------------

export type RawCell = string | number | boolean | Date | null | undefined;

/**
 * Table exactly as the reader produced it. `columns` is the header row.
 * Rows may be shorter or longer than the header.
 */
export interface RawTable {
  columns: RawCell[];
  rows: RawCell[][];
}

/**
 * Canonical table: folded header names, trimmed string cells,
 * every row exactly `columns.length` wide.
 *
 * Row i (0-based) is data row number i + 1 everywhere in the engine.
 */
export interface NormalizedTable {
  columns: string[];
  rows: string[][];
}

/** Output tables (results, validation report) share the normalized shape. */
export type ResultTable = NormalizedTable;
export type ReportTable = NormalizedTable;

export interface CanonicalRow {
  row_number: number;
  floor_number: string;
  wap_hostname: string;
  serial_number: string;
  mac_address: string;
}

// ------------------------------------------------------------
// Inventory service
// ------------------------------------------------------------

export interface InventoryRecord {
  serial: string;
  mac: string;
  model?: string;
  name?: string;
  site_id?: string | null;
}

/** serial (trimmed, case-sensitive) → record. Built once per run. */
export type InventorySnapshot = ReadonlyMap<string, InventoryRecord>;

export interface Site {
  id: string;
  name: string;
}

export type AssignResult =
  | { ok: true }
  | { ok: false; status: number | null; message: string };

// ------------------------------------------------------------
// Validation
// ------------------------------------------------------------

export interface Issue {
  /** 1-based data row; 0 means the issue applies to the whole file. */
  row: number;
  field: string;
  value: string;
  message: string;
  code: ErrorCode;
}

// ------------------------------------------------------------
// Assignment
// ------------------------------------------------------------

export type AssignmentStatus = 'SUCCESS' | 'FAILED';

export interface AssignmentOutcome {
  row_number: number;
  serial_number: string;
  mac_address: string;
  status: AssignmentStatus;
  error_message: string;
  error_code?: ErrorCode;
}

export interface AssignmentSummary {
  success: number;
  failed: number;
  total: number;
}

export type OutputFormat = 'csv' | 'xlsx';
