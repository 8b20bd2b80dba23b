// api/apTemplateDownload.ts
// Streams an empty AP input workbook with the required header row.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { XLSX_CONTENT_TYPE } from '../engine/constants';
import { createApTemplateWorkbook, workbookToBuffer } from '../engine/excelExport';

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    res.setHeader('Allow', 'GET, HEAD');
    return res.status(405).json({ error: 'Method Not Allowed' });
  }

  try {
    const buffer = await workbookToBuffer(await createApTemplateWorkbook());

    res.setHeader('Content-Type', XLSX_CONTENT_TYPE);
    res.setHeader('Content-Disposition', 'attachment; filename="AP_Input_Template.xlsx"');
    res.setHeader('Content-Length', buffer.length);

    // HEAD request: headers only
    if (req.method === 'HEAD') {
      return res.status(200).end();
    }

    return res.status(200).send(buffer);
  } catch (err) {
    console.error('[apTemplateDownload] failed', err);
    return res.status(500).json({ error: 'Failed to generate AP input template.' });
  }
}
