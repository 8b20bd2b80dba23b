// engine/errorCodes.ts
// Canonical error codes for the AP site import engine.
//
// Code ranges:
//
//  E100–E199 → Input file could not be read
//  E200–E299 → Structural (schema) problems with the header row
//  E300–E399 → Inventory service fetch failures (fatal to the run)
//  E400–E499 → Row issues (collected; any one blocks the whole batch)
//  E500–E599 → Assignment failures (row-local, recorded in the result table)
//  E600–E699 → Configuration / request transport issues

// NOTE:
// - E1xx / E3xx / E6xx stop the pipeline with a single terminal error.
// - E2xx / E4xx are reported as Issues and block assignment (all-or-none).
// - E5xx never stop the run; they become FAILED outcomes.

export const ErrorCodes = {
  // 1xx – Input reader
  INPUT_FILE_NOT_FOUND: 'E101',
  UNSUPPORTED_FILE_KIND: 'E102',
  SHEET_NOT_FOUND: 'E103',
  INPUT_UNPARSABLE: 'E104',

  // 2xx – Schema
  MISSING_REQUIRED_COLUMNS: 'E201',

  // 3xx – Inventory service fetches
  INVENTORY_FETCH_FAILED: 'E301',
  SITES_FETCH_FAILED: 'E302',

  // 4xx – Row issues
  SERIAL_BLANK: 'E401',
  SERIAL_NOT_IN_INVENTORY: 'E402',
  MAC_FORMAT_INVALID: 'E403',

  // 5xx – Assignment
  ASSIGN_REJECTED: 'E501',      // remote answered with a non-2xx status
  ASSIGN_TRANSPORT_FAILED: 'E502',
  ASSIGN_NO_MAC: 'E503',

  // 6xx – Configuration / transport
  MISSING_CONFIGURATION: 'E601',
  INVALID_REQUEST_BODY: 'E602',
  UNKNOWN_SITE: 'E603',
  INTERNAL_ERROR: 'E604'
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Human-readable descriptions (logs / API error bodies)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.INPUT_FILE_NOT_FOUND]: 'Input file does not exist or cannot be read.',
  [ErrorCodes.UNSUPPORTED_FILE_KIND]: 'Input file must be CSV, TSV or XLSX.',
  [ErrorCodes.SHEET_NOT_FOUND]: 'Requested worksheet does not exist in the workbook.',
  [ErrorCodes.INPUT_UNPARSABLE]: 'Input file could not be parsed.',

  [ErrorCodes.MISSING_REQUIRED_COLUMNS]: 'One or more required columns are missing from the header row.',

  [ErrorCodes.INVENTORY_FETCH_FAILED]: 'Device inventory could not be retrieved.',
  [ErrorCodes.SITES_FETCH_FAILED]: 'Site list could not be retrieved.',

  [ErrorCodes.SERIAL_BLANK]: 'Serial Number is blank.',
  [ErrorCodes.SERIAL_NOT_IN_INVENTORY]: 'Serial Number is not present in the organization inventory.',
  [ErrorCodes.MAC_FORMAT_INVALID]: 'MAC Address is not six colon-separated hex pairs.',

  [ErrorCodes.ASSIGN_REJECTED]: 'Inventory service rejected the assignment.',
  [ErrorCodes.ASSIGN_TRANSPORT_FAILED]: 'Assignment request did not reach the inventory service.',
  [ErrorCodes.ASSIGN_NO_MAC]: 'No MAC address available to assign.',

  [ErrorCodes.MISSING_CONFIGURATION]: 'Required configuration value is not set.',
  [ErrorCodes.INVALID_REQUEST_BODY]: 'Request body is missing or malformed.',
  [ErrorCodes.UNKNOWN_SITE]: 'Selected site does not exist.',
  [ErrorCodes.INTERNAL_ERROR]: 'Internal processing failure.'
};
