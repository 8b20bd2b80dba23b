// api/cron/cleanupResults.ts
// Purpose: Delete result / validation-report blobs older than the retention window (2 hours).
// Schedule: every 1 hour (via Vercel Cron, see vercel.json)
// Supports: dry-run mode (no deletions)

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { list, del } from '@vercel/blob';
import type { ListBlobResult } from '@vercel/blob';

import { DEFAULT_APP_CONFIG } from '../../engine/config';

function parseBool(v: unknown): boolean {
  const s = String(v ?? '').trim().toLowerCase();
  return s === '1' || s === 'true' || s === 'yes' || s === 'y';
}

function firstQueryValue(v: string | string[] | undefined): string | undefined {
  return Array.isArray(v) ? v[0] : v;
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  // Cron calls are GET by default
  if (req.method !== 'GET') {
    res.setHeader('Allow', 'GET');
    return res.status(405).json({ error: 'Method not allowed' });
  }

  const now = Date.now();
  const retentionMs = DEFAULT_APP_CONFIG.results.retentionMs;

  // Dry-run can be controlled via query or env
  const dry_run =
    parseBool(firstQueryValue(req.query.dry_run)) || parseBool(process.env.CLEANUP_DRY_RUN);

  // Only ever delete artifacts written by the import pipeline.
  const prefix =
    firstQueryValue(req.query.prefix) ??
    process.env.RESULTS_PREFIX ??
    DEFAULT_APP_CONFIG.results.prefix;

  let scanned = 0;
  let eligible = 0;
  let deleted = 0;
  const sample_deleted: string[] = [];
  const sample_kept: string[] = [];

  try {
    let cursor: string | undefined = undefined;

    do {
      const page: ListBlobResult = await list({ prefix, cursor, limit: 1000 });
      scanned += page.blobs.length;

      const expired: string[] = [];
      for (const blob of page.blobs) {
        const ageMs = now - blob.uploadedAt.getTime();
        if (!Number.isFinite(ageMs) || ageMs <= retentionMs) {
          // Unknown or young: keep it.
          if (sample_kept.length < 5) sample_kept.push(blob.url);
          continue;
        }

        eligible += 1;
        expired.push(blob.url);
        if (sample_deleted.length < 5) sample_deleted.push(blob.url);
      }

      if (!dry_run && expired.length > 0) {
        await del(expired);
        deleted += expired.length;
      }

      cursor = page.hasMore ? page.cursor : undefined;
    } while (cursor);

    return res.status(200).json({
      ok: true,
      dry_run,
      prefix,
      scanned,
      eligible,
      deleted: dry_run ? 0 : deleted,
      would_delete: dry_run ? eligible : 0,
      sample_deleted,
      sample_kept
    });
  } catch (err) {
    console.error('[cleanupResults] failed', err);
    return res.status(500).json({
      ok: false,
      error: 'Cleanup failed',
      dry_run,
      prefix
    });
  }
}
