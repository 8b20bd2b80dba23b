// engine/validateTransport.ts
// Transport-level validation for POST /api/assignAps.
//
// Responsibilities:
//  - Validate the top-level request structure
//  - Decode the base64 file payload
//  - Do NOT perform domain logic (columns, serials, MACs, etc.)

import { ErrorCodes } from './errorCodes';
import { inferInputKind, type InputKind } from './readInput';
import { BASE64_BODY } from './regex';

export interface AssignApsRequestBody {
  file_name?: unknown;
  file_base64?: unknown;
  site_id?: unknown;
  dry_run?: unknown;
}

export interface AssignApsRequest {
  file_name: string;
  kind: InputKind;
  buffer: Buffer;
  site_id: string;
  dry_run: boolean;
}

export type TransportValidationResult =
  | { ok: true; request: AssignApsRequest }
  | {
      ok: false;
      errorStatus: number;
      errorBody: { error: string; error_codes: string[] };
    };

function reject(error: string, code: string = ErrorCodes.INVALID_REQUEST_BODY): TransportValidationResult {
  return { ok: false, errorStatus: 400, errorBody: { error, error_codes: [code] } };
}

function nonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function parseBool(v: unknown): boolean {
  if (typeof v === 'boolean') return v;
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

export function decodeBase64Payload(raw: string): Buffer | null {
  // Accept data URLs from browser FileReader as well.
  const payload = raw.replace(/^data:[^,]*;base64,/, '');
  if (!BASE64_BODY.test(payload)) return null;

  let base64 = payload.replace(/\s+/g, '').replace(/-/g, '+').replace(/_/g, '/');
  const pad = base64.length % 4;
  if (pad === 2) base64 += '==';
  else if (pad === 3) base64 += '=';

  const buffer = Buffer.from(base64, 'base64');
  return buffer.length === 0 ? null : buffer;
}

export function validateAssignApsRequest(body: unknown): TransportValidationResult {
  // -----------------------------------------
  // 1) Top-level object shape
  // -----------------------------------------
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    return reject('Invalid request structure.');
  }
  const typed: AssignApsRequestBody = body;

  // -----------------------------------------
  // 2) File name + kind
  // -----------------------------------------
  const file_name = nonEmptyString(typed.file_name);
  if (!file_name) {
    return reject('file_name is required and must be a string.');
  }

  const kind = inferInputKind(file_name);
  if (!kind) {
    return reject('Only CSV, TSV and XLSX files are supported.', ErrorCodes.UNSUPPORTED_FILE_KIND);
  }

  // -----------------------------------------
  // 3) File content
  // -----------------------------------------
  const encoded = nonEmptyString(typed.file_base64);
  const buffer = encoded ? decodeBase64Payload(encoded) : null;
  if (!buffer) {
    return reject('file_base64 is required and must be non-empty base64.');
  }

  // -----------------------------------------
  // 4) Site selection
  // -----------------------------------------
  const site_id = nonEmptyString(typed.site_id);
  if (!site_id) {
    return reject('site_id is required and must be a string.');
  }

  return {
    ok: true,
    request: { file_name, kind, buffer, site_id, dry_run: parseBool(typed.dry_run) }
  };
}
