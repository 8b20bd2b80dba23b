// engine/tableExport.ts
// Serialize an output table to CSV or XLSX bytes. No business logic.

import { stringify } from 'csv-stringify/sync';

import { CSV_CONTENT_TYPE, XLSX_CONTENT_TYPE } from './constants';
import { createTableWorkbook, workbookToBuffer } from './excelExport';
import type { NormalizedTable, OutputFormat } from './types';

export interface SerializedTable {
  content: Buffer;
  contentType: string;
  extension: OutputFormat;
}

export function tableToCsv(table: NormalizedTable): string {
  return stringify([table.columns, ...table.rows], { record_delimiter: '\n' });
}

export async function serializeTable(
  table: NormalizedTable,
  format: OutputFormat,
  options: { sheetName: string; createdAt?: Date }
): Promise<SerializedTable> {
  if (format === 'xlsx') {
    const workbook = await createTableWorkbook(table, options.sheetName, options.createdAt);
    return {
      content: await workbookToBuffer(workbook),
      contentType: XLSX_CONTENT_TYPE,
      extension: 'xlsx'
    };
  }

  return {
    content: Buffer.from(tableToCsv(table), 'utf8'),
    contentType: CSV_CONTENT_TYPE,
    extension: 'csv'
  };
}
