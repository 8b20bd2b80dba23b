// engine/inventoryClient.ts
//
// Boundary to the remote device-inventory service.
// The engine only depends on the InventoryClient interface; the REST
// implementation below talks to the org-scoped inventory API:
//
//   GET  {base}/api/v1/orgs/{org}/inventory   → [{ serial, mac, ... }]
//   GET  {base}/api/v1/orgs/{org}/sites       → [{ id, name, ... }]
//   PUT  {base}/api/v1/orgs/{org}/inventory   ← { op: 'assign', site_id, macs: [mac] }

import type { InventoryServiceConfig } from './config';
import { ErrorCodes, type ErrorCode } from './errorCodes';
import { AssignError, FetchError, errorMessage } from './errors';
import { toSafeTrimmedString } from './normalizeFields';
import type { AssignResult, InventoryRecord, InventorySnapshot, Site } from './types';

export interface InventoryClient {
  fetchInventory(): Promise<InventorySnapshot>;
  fetchSites(): Promise<Site[]>;
  /**
   * Resolves `{ ok: false }` when the service answers with an error status.
   * Rejects only when the request never completed.
   */
  assign(siteId: string, mac: string): Promise<AssignResult>;
}

export type FetchLike = typeof fetch;

// ------------------------------------------------------------
// Response shaping
// ------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Build the serial → record map. Entries without a serial are dropped;
 * serials are trimmed but otherwise kept exactly (case-sensitive).
 */
export function buildInventorySnapshot(items: readonly unknown[]): InventorySnapshot {
  const snapshot = new Map<string, InventoryRecord>();

  for (const src of items) {
    if (!isRecord(src)) continue;

    const serial = toSafeTrimmedString(src.serial);
    if (!serial) continue;

    const record: InventoryRecord = {
      serial,
      mac: toSafeTrimmedString(src.mac),
      model: optionalString(src.model),
      name: optionalString(src.name)
    };
    if (typeof src.site_id === 'string' || src.site_id === null) {
      record.site_id = src.site_id;
    }

    snapshot.set(serial, record);
  }

  return snapshot;
}

export function parseSites(items: readonly unknown[]): Site[] {
  const sites: Site[] = [];
  for (const src of items) {
    if (!isRecord(src)) continue;
    const id = toSafeTrimmedString(src.id);
    if (!id) continue;
    sites.push({ id, name: toSafeTrimmedString(src.name) });
  }
  return sites.sort((a, b) =>
    a.name.toLowerCase().localeCompare(b.name.toLowerCase())
  );
}

// ------------------------------------------------------------
// REST client
// ------------------------------------------------------------

export function createRestInventoryClient(
  config: InventoryServiceConfig,
  fetchImpl: FetchLike = fetch
): InventoryClient {
  const orgUrl = `${config.baseUrl}/api/v1/orgs/${encodeURIComponent(config.orgId)}`;
  const headers = {
    Authorization: `Token ${config.apiToken}`,
    'Content-Type': 'application/json'
  };

  async function getJsonArray(url: string, code: ErrorCode, what: string): Promise<unknown[]> {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(config.requestTimeoutMs)
      });
    } catch (err) {
      throw new FetchError(code, `Failed to fetch ${what}: ${errorMessage(err)}`, null, {
        cause: err
      });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new FetchError(
        code,
        `Failed to fetch ${what} (HTTP ${response.status}): ${text}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new FetchError(code, `Failed to fetch ${what}: response is not JSON`, response.status, {
        cause: err
      });
    }

    if (!Array.isArray(body)) {
      throw new FetchError(
        code,
        `Failed to fetch ${what}: expected a JSON array`,
        response.status
      );
    }
    return body;
  }

  return {
    async fetchInventory() {
      const items = await getJsonArray(
        `${orgUrl}/inventory`,
        ErrorCodes.INVENTORY_FETCH_FAILED,
        'inventory'
      );
      return buildInventorySnapshot(items);
    },

    async fetchSites() {
      const items = await getJsonArray(`${orgUrl}/sites`, ErrorCodes.SITES_FETCH_FAILED, 'sites');
      return parseSites(items);
    },

    async assign(siteId, mac) {
      let response: Response;
      try {
        response = await fetchImpl(`${orgUrl}/inventory`, {
          method: 'PUT',
          headers,
          body: JSON.stringify({ op: 'assign', site_id: siteId, macs: [mac] }),
          signal: AbortSignal.timeout(config.requestTimeoutMs)
        });
      } catch (err) {
        throw new AssignError(
          ErrorCodes.ASSIGN_TRANSPORT_FAILED,
          `Assign request failed: ${errorMessage(err)}`,
          { cause: err }
        );
      }

      if (response.ok) {
        // Release the connection back to the pool.
        await response.body?.cancel();
        return { ok: true };
      }

      const text = await response.text().catch(() => '');
      return {
        ok: false,
        status: response.status,
        message: `Assign failed (HTTP ${response.status}): ${text}`
      };
    }
  };
}
