// api/assignAps.ts
// POST /api/assignAps
//
// Body: { file_name, file_base64, site_id, dry_run? }
//
// Runs the validation-gated pipeline against the uploaded AP sheet.
//  - 200 COMPLETED: per-row outcomes + result_url
//  - 200 VALIDATED: dry run passed, nothing assigned
//  - 422 BLOCKED:   issues + report_url, nothing assigned (all-or-none)

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { createBlobArtifactStore } from '../engine/artifactStore';
import { loadAppConfig } from '../engine/config';
import { ErrorCodes } from '../engine/errorCodes';
import { ConfigError, FetchError, ReadError, SiteError } from '../engine/errors';
import { createConsoleEventSink } from '../engine/events';
import { createRestInventoryClient } from '../engine/inventoryClient';
import { runAssignmentPipeline } from '../engine/runAssignmentPipeline';
import { validateAssignApsRequest } from '../engine/validateTransport';

function parseBody(raw: unknown): { ok: true; body: unknown } | { ok: false } {
  if (typeof raw !== 'string') return { ok: true, body: raw };
  try {
    return { ok: true, body: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  const parsed = parseBody(req.body);
  if (!parsed.ok) {
    return res.status(400).json({
      error: 'Invalid JSON body.',
      error_codes: [ErrorCodes.INVALID_REQUEST_BODY]
    });
  }

  const transport = validateAssignApsRequest(parsed.body);
  if (!transport.ok) {
    return res.status(transport.errorStatus).json(transport.errorBody);
  }
  const { request } = transport;

  try {
    const config = loadAppConfig();
    const client = createRestInventoryClient(config.inventory);

    const result = await runAssignmentPipeline(
      {
        input: { buffer: request.buffer, file_name: request.file_name, kind: request.kind },
        site_id: request.site_id,
        verify_site: true,
        sheet_name: config.input.sheetName,
        dry_run: request.dry_run,
        concurrency: config.execution.assignConcurrency,
        output_format: config.results.format
      },
      {
        client,
        store: createBlobArtifactStore(config.results.prefix),
        sink: createConsoleEventSink()
      }
    );

    switch (result.status) {
      case 'BLOCKED':
        return res.status(422).json({
          status: result.status,
          error: 'Import blocked: fix the file and re-run. No APs were assigned.',
          issues: result.issues,
          report_url: result.report_location,
          required_fields: result.required_fields
        });

      case 'VALIDATED':
        return res.status(200).json({
          status: result.status,
          site_name: result.site_name,
          row_count: result.row_count
        });

      case 'COMPLETED':
        return res.status(200).json({
          status: result.status,
          site_name: result.site_name,
          summary: result.summary,
          result_url: result.result_location,
          columns: result.table.columns,
          rows: result.table.rows
        });
    }
  } catch (err) {
    console.error('[assignAps] failed', err);

    if (err instanceof ReadError || err instanceof SiteError) {
      return res.status(400).json({ error: err.message, error_codes: [err.code] });
    }
    if (err instanceof FetchError) {
      return res.status(502).json({ error: err.message, error_codes: [err.code] });
    }
    if (err instanceof ConfigError) {
      return res.status(500).json({ error: err.message, error_codes: [err.code] });
    }
    return res.status(500).json({
      error: 'AP site import failed (server).',
      error_codes: [ErrorCodes.INTERNAL_ERROR]
    });
  }
}
