// engine/validateSchema.ts
// Header-level check: every required column must be present after normalization.

import { ErrorCodes } from './errorCodes';
import { HEADER_ISSUE_FIELD, MSG_MISSING_COLUMNS, REQUIRED_COLUMNS } from './constants';
import type { Issue } from './types';

/** Required columns absent from the header, in required-column order. */
export function findMissingColumns(columns: readonly string[]): string[] {
  const present = new Set(columns);
  return REQUIRED_COLUMNS.filter((column) => !present.has(column));
}

/** The single row-0 issue raised when the file is structurally wrong. */
export function buildHeaderIssue(missing: readonly string[]): Issue {
  return {
    row: 0,
    field: HEADER_ISSUE_FIELD,
    value: missing.join(', '),
    message: MSG_MISSING_COLUMNS,
    code: ErrorCodes.MISSING_REQUIRED_COLUMNS
  };
}
