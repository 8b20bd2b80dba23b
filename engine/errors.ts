// engine/errors.ts
// Terminal error classes. Row issues are data (see types.ts), not exceptions.

import { ErrorCodes, type ErrorCode } from './errorCodes';

export class ApImportError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** File missing/unreadable, unsupported kind, or named sheet absent. */
export class ReadError extends ApImportError {}

/** Inventory or site-list retrieval failed; no validation without the snapshot. */
export class FetchError extends ApImportError {
  readonly status: number | null;

  constructor(
    code: ErrorCode,
    message: string,
    status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
    this.status = status;
  }
}

export class ConfigError extends ApImportError {
  constructor(message: string) {
    super(ErrorCodes.MISSING_CONFIGURATION, message);
  }
}

/** The selected site is not one of the org's sites. */
export class SiteError extends ApImportError {
  constructor(siteId: string) {
    super(ErrorCodes.UNKNOWN_SITE, `Unknown site_id: ${siteId}`);
  }
}

/** Row-local assignment failure. Captured into the result table, never rethrown by the executor. */
export class AssignError extends ApImportError {}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
