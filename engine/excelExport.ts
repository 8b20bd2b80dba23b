// engine/excelExport.ts
import ExcelJS from 'exceljs';
import { REQUIRED_FIELD_LABELS, TEMPLATE_SHEET_NAME } from './constants';
import type { NormalizedTable } from './types';

// -------------------------------
// Template workbook (AP_Input)
// -------------------------------
export async function createApTemplateWorkbook(): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(TEMPLATE_SHEET_NAME);

  const headers = [...REQUIRED_FIELD_LABELS];

  sheet.addRow(headers);
  sheet.getRow(1).font = { bold: true };

  sheet.autoFilter = {
    from: { row: 1, column: 1 },
    to: { row: 1, column: headers.length }
  };

  // Serials and MACs are identifiers, not numbers.
  headers.forEach((header, index) => {
    const column = sheet.getColumn(index + 1);
    column.width = Math.max(header.length + 4, 18);
    column.numFmt = '@';
  });

  return workbook;
}

// -------------------------------
// Table workbook (results / validation report)
// -------------------------------
export async function createTableWorkbook(
  table: NormalizedTable,
  sheetName: string,
  createdAt?: Date
): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  if (createdAt && !Number.isNaN(createdAt.getTime())) {
    workbook.created = createdAt;
    workbook.modified = createdAt;
  }

  const sheet = workbook.addWorksheet(sheetName);

  sheet.addRow(table.columns);
  sheet.getRow(1).font = { bold: true };

  for (const row of table.rows) {
    sheet.addRow(row);
  }

  // Auto width per column
  table.columns.forEach((header, index) => {
    const column = sheet.getColumn(index + 1);

    let maxLength = header.length;
    for (const row of table.rows) {
      const len = (row[index] ?? '').length;
      if (len > maxLength) maxLength = len;
    }

    column.width = Math.min(Math.max(maxLength + 4, 12), 80);
  });

  return workbook;
}

export async function workbookToBuffer(workbook: ExcelJS.Workbook): Promise<Buffer> {
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}
