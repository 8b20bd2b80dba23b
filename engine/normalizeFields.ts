// engine/normalizeFields.ts
// Cell-level normalization helpers (header names, cell values, MAC addresses).

import { MAC_CANONICAL, MAC_DASH } from './regex';

// ------------------------------------------------------------
// Core string helper
// ------------------------------------------------------------

/**
 * Safely convert any unknown value to a trimmed string.
 * Never returns null/undefined; always returns a string (possibly empty).
 *
 * Dates become YYYY-MM-DD so that a spreadsheet date cell reads the same
 * way every time it is normalized.
 */
export function toSafeTrimmedString(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString().slice(0, 10);
  }
  return String(value ?? '').trim();
}

// ------------------------------------------------------------
// Header names
// ------------------------------------------------------------

/**
 * Header names are trimmed and lower-cased. Blank headers get a positional
 * name (`column 3`) so their cells still pass through to the output tables.
 */
export function normalizeHeaderName(raw: unknown, position: number): string {
  const safe = toSafeTrimmedString(raw).toLowerCase();
  return safe || `column ${position}`;
}

// ------------------------------------------------------------
// MAC address normalization
// ------------------------------------------------------------

/**
 * Canonicalize a MAC address:
 *  - trim + lower-case
 *  - "-" separators become ":"
 *  - a bare 12-character value is regrouped into pairs
 *
 * Any other shape is returned as-is (after the steps above); callers use
 * isCanonicalMac to decide whether it is acceptable.
 */
export function normalizeMacAddress(raw: unknown): string {
  const mac = toSafeTrimmedString(raw).toLowerCase().replace(MAC_DASH, ':');

  if (!mac.includes(':') && mac.length === 12) {
    return mac.match(/.{2}/g)?.join(':') ?? mac;
  }

  return mac;
}

/** True for lower-case, colon-separated, six pairs of hex digits. */
export function isCanonicalMac(mac: string): boolean {
  return MAC_CANONICAL.test(mac);
}
