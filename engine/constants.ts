// engine/constants.ts
// Column names, display labels and fixed messages shared across modules.

// ------------------------------------------------------------
// Required columns (normalized form, in display order)
// ------------------------------------------------------------

export const COLUMN_FLOOR = 'floor #';
export const COLUMN_WAP_HOSTNAME = 'wap hostname';
export const COLUMN_SERIAL = 'serial number';
export const COLUMN_MAC = 'mac address';

export const REQUIRED_COLUMNS = [
  COLUMN_FLOOR,
  COLUMN_WAP_HOSTNAME,
  COLUMN_SERIAL,
  COLUMN_MAC
] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

// Surfaced verbatim to callers for display.
export const REQUIRED_FIELD_LABELS = [
  'Floor #',
  'WAP Hostname',
  'Serial Number',
  'Mac Address'
] as const;

// ------------------------------------------------------------
// Output columns
// ------------------------------------------------------------

export const COLUMN_ASSIGNMENT_STATUS = 'assignment status';
export const COLUMN_ERROR_MESSAGE = 'error message';

export const COLUMN_ISSUE = 'issue';
export const COLUMN_ISSUE_FIELD = 'issue_field';
export const COLUMN_ISSUE_VALUE = 'issue_value';

export const ISSUE_JOINER = ' | ';

// ------------------------------------------------------------
// Issue messages
// ------------------------------------------------------------

export const HEADER_ISSUE_FIELD = 'headers';
export const MSG_MISSING_COLUMNS = 'Missing required column(s)';
export const MSG_SERIAL_BLANK = 'blank';
export const MSG_SERIAL_NOT_FOUND = 'not found in inventory';
export const MSG_MAC_INVALID = 'format invalid';

// ------------------------------------------------------------
// Artifacts
// ------------------------------------------------------------

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const CSV_CONTENT_TYPE = 'text/csv; charset=utf-8';

export const RESULTS_SHEET_NAME = 'AP_Results';
export const REPORT_SHEET_NAME = 'Validation_Report';
export const TEMPLATE_SHEET_NAME = 'AP_Input';
