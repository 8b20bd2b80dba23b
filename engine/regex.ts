// engine/regex.ts
// Centralized regular expressions for the AP site import engine.

// ------------------------------------------------------------
// MAC addresses
// ------------------------------------------------------------

// Canonical: aa:bb:cc:dd:ee:ff (lower-case hex pairs)
export const MAC_CANONICAL = /^[0-9a-f]{2}(?::[0-9a-f]{2}){5}$/;

// Dash-separated vendors (aa-bb-cc-dd-ee-ff) are folded into ':' first.
export const MAC_DASH = /-/g;

// ------------------------------------------------------------
// Input files
// ------------------------------------------------------------

export const EXT_CSV = /\.csv$/i;
export const EXT_TSV = /\.(tsv|txt)$/i;
export const EXT_XLSX = /\.xlsx$/i;

// ------------------------------------------------------------
// Transport
// ------------------------------------------------------------

// Standard or URL-safe base64, optional padding, whitespace tolerated.
export const BASE64_BODY = /^[A-Za-z0-9+/_\-\s]*={0,2}\s*$/;
