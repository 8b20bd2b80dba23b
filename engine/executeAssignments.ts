// engine/executeAssignments.ts
//
// Assign every row of a validated batch to the selected site.
//
// Best-effort per row: a failure is recorded in that row's outcome and the
// batch keeps going. Nothing already assigned is rolled back. Outcomes are
// written to row-indexed slots, so output order is row order whatever the
// concurrency.

import { ErrorCodes } from './errorCodes';
import { ApImportError, errorMessage } from './errors';
import { COLUMN_ASSIGNMENT_STATUS, COLUMN_ERROR_MESSAGE } from './constants';
import { noopEventSink, type PipelineEventSink } from './events';
import type { InventoryClient } from './inventoryClient';
import { normalizeMacAddress } from './normalizeFields';
import type { ValidatedBatch } from './validateRows';
import type {
  AssignmentOutcome,
  AssignmentSummary,
  CanonicalRow,
  ResultTable
} from './types';

export interface ExecuteOptions {
  siteId: string;
  client: InventoryClient;
  /** Max in-flight assign calls. 1 (default) is strictly sequential. */
  concurrency?: number;
  sink?: PipelineEventSink;
}

export interface ExecutionResult {
  table: ResultTable;
  outcomes: AssignmentOutcome[];
  summary: AssignmentSummary;
}

/**
 * Inventory MAC wins over the file MAC when both exist.
 */
export function resolveAssignMac(row: CanonicalRow, batch: ValidatedBatch): string {
  const record = batch.snapshot.get(row.serial_number.trim());
  return normalizeMacAddress(record?.mac || row.mac_address);
}

async function assignRow(
  row: CanonicalRow,
  batch: ValidatedBatch,
  options: ExecuteOptions
): Promise<AssignmentOutcome> {
  const serial = row.serial_number.trim();
  const mac = resolveAssignMac(row, batch);
  const base = { row_number: row.row_number, serial_number: serial, mac_address: mac };

  if (!mac) {
    return {
      ...base,
      status: 'FAILED',
      error_message: `No MAC address available for serial ${serial}`,
      error_code: ErrorCodes.ASSIGN_NO_MAC
    };
  }

  try {
    const result = await options.client.assign(options.siteId, mac);
    if (result.ok) {
      return { ...base, status: 'SUCCESS', error_message: '' };
    }
    return {
      ...base,
      status: 'FAILED',
      error_message: result.message,
      error_code: ErrorCodes.ASSIGN_REJECTED
    };
  } catch (err) {
    return {
      ...base,
      status: 'FAILED',
      error_message: errorMessage(err),
      error_code: err instanceof ApImportError ? err.code : ErrorCodes.ASSIGN_TRANSPORT_FAILED
    };
  }
}

/** Anything but a positive number means sequential. */
export function resolveConcurrency(requested: number | undefined): number {
  if (requested === undefined || !Number.isFinite(requested) || requested < 1) return 1;
  return Math.floor(requested);
}

// A slot left empty means its worker never got to the row.
function unreachedOutcome(row: CanonicalRow): AssignmentOutcome {
  return {
    row_number: row.row_number,
    serial_number: row.serial_number.trim(),
    mac_address: '',
    status: 'FAILED',
    error_message: `Row ${row.row_number} was not processed`,
    error_code: ErrorCodes.ASSIGN_TRANSPORT_FAILED
  };
}

export async function executeAssignments(
  batch: ValidatedBatch,
  options: ExecuteOptions
): Promise<ExecutionResult> {
  if (batch.issues.length > 0) {
    throw new Error('executeAssignments called with a batch that has validation issues.');
  }

  const sink = options.sink ?? noopEventSink;
  const rows = batch.rows;
  const slots = new Array<AssignmentOutcome | undefined>(rows.length);
  const workerCount = Math.min(resolveConcurrency(options.concurrency), Math.max(rows.length, 1));

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < rows.length) {
      const index = next++;
      const row = rows[index];
      const outcome = await assignRow(row, batch, options);
      slots[index] = outcome;

      if (outcome.status === 'SUCCESS') {
        sink.record({
          type: 'row_assigned',
          row: row.row_number,
          serial: outcome.serial_number,
          mac: outcome.mac_address,
          site_id: options.siteId
        });
      } else {
        sink.record({
          type: 'row_failed',
          row: row.row_number,
          serial: outcome.serial_number,
          mac: outcome.mac_address,
          site_id: options.siteId,
          error: outcome.error_message,
          code: outcome.error_code
        });
      }
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const outcomes = rows.map((row, i) => slots[i] ?? unreachedOutcome(row));
  const success = outcomes.filter((o) => o.status === 'SUCCESS').length;
  const summary: AssignmentSummary = {
    success,
    failed: outcomes.length - success,
    total: outcomes.length
  };

  const table: ResultTable = {
    columns: [...batch.table.columns, COLUMN_ASSIGNMENT_STATUS, COLUMN_ERROR_MESSAGE],
    rows: batch.table.rows.map((cells, i) => [
      ...cells,
      outcomes[i].status,
      outcomes[i].error_message
    ])
  };

  return { table, outcomes, summary };
}
