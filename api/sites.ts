// api/sites.ts
// GET /api/sites → sites of the configured org, sorted by name (for site selection).

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { loadAppConfig } from '../engine/config';
import { ErrorCodes } from '../engine/errorCodes';
import { ConfigError, FetchError } from '../engine/errors';
import { createRestInventoryClient } from '../engine/inventoryClient';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  try {
    const config = loadAppConfig();
    const client = createRestInventoryClient(config.inventory);
    const sites = await client.fetchSites();
    return res.status(200).json({ sites });
  } catch (err) {
    console.error('[sites] failed', err);

    if (err instanceof ConfigError) {
      return res.status(500).json({ error: err.message, error_codes: [err.code] });
    }
    if (err instanceof FetchError) {
      return res.status(502).json({ error: err.message, error_codes: [err.code] });
    }
    return res.status(500).json({
      error: 'Failed to list sites.',
      error_codes: [ErrorCodes.INTERNAL_ERROR]
    });
  }
}
