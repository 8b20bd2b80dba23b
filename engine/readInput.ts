// engine/readInput.ts
//
// Parse AP input files (CSV / TSV / XLSX) into a RawTable.
// Every cell comes back as text: serials and MACs must never be
// reinterpreted as numbers.

import fs from 'node:fs/promises';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { parse } from 'csv-parse/sync';

import type { RawCell, RawTable } from './types';
import { ErrorCodes } from './errorCodes';
import { ReadError, errorMessage } from './errors';
import { EXT_CSV, EXT_TSV, EXT_XLSX } from './regex';

export type InputKind = 'csv' | 'tsv' | 'xlsx';

export interface ReadInputOptions {
  kind?: InputKind;
  sheetName?: string | null;
}

export interface ParseInputOptions extends ReadInputOptions {
  /** Used for kind inference and error messages when `kind` is not given. */
  fileName?: string;
}

export function inferInputKind(fileName: string): InputKind | null {
  if (EXT_CSV.test(fileName)) return 'csv';
  if (EXT_TSV.test(fileName)) return 'tsv';
  if (EXT_XLSX.test(fileName)) return 'xlsx';
  return null;
}

// ------------------------------------------------------------
// Delimited text
// ------------------------------------------------------------

function parseDelimited(buffer: Buffer, delimiter: string, label: string): RawTable {
  let records: unknown;
  try {
    records = parse(buffer, {
      bom: true,
      delimiter,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true
    });
  } catch (err) {
    throw new ReadError(
      ErrorCodes.INPUT_UNPARSABLE,
      `Could not parse ${label}: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (!Array.isArray(records) || records.length === 0) {
    return { columns: [], rows: [] };
  }

  const lines = records.map((record): string[] =>
    Array.isArray(record) ? record.map((cell) => String(cell ?? '')) : []
  );

  const [header, ...rows] = lines;
  return { columns: header, rows };
}

// ------------------------------------------------------------
// Spreadsheet
// ------------------------------------------------------------

type FormulaResult =
  | ExcelJS.CellFormulaValue['result']
  | ExcelJS.CellSharedFormulaValue['result'];

function cellToText(value: ExcelJS.CellValue): string {
  if (value == null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    // exceljs hands dates back in UTC
    return value.toISOString().slice(0, 10);
  }
  if ('richText' in value) return value.richText.map((part) => part.text).join('');
  if ('hyperlink' in value) {
    // `text` may itself be rich text when the link label is formatted.
    return cellToText(value.text ?? null) || value.hyperlink;
  }
  if ('formula' in value || 'sharedFormula' in value) return formulaResultToText(value.result);
  if ('error' in value) return String(value.error);
  return '';
}

// Formulas are read by their cached result; nothing is recalculated.
function formulaResultToText(result: FormulaResult): string {
  if (result === undefined) return '';
  if (typeof result === 'object' && !(result instanceof Date)) return String(result.error);
  return cellToText(result);
}

function isRowEmpty(cells: RawCell[]): boolean {
  return cells.every((cell) => cell == null || String(cell).trim() === '');
}

async function parseWorkbook(
  buffer: Buffer,
  sheetName: string | null | undefined,
  label: string
): Promise<RawTable> {
  // exceljs wants an ArrayBuffer; copy out of the (possibly pooled) Node buffer.
  const data = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(data).set(buffer);

  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.load(data);
  } catch (err) {
    throw new ReadError(
      ErrorCodes.INPUT_UNPARSABLE,
      `Could not parse ${label} as XLSX: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const worksheet = sheetName ? workbook.getWorksheet(sheetName) : workbook.worksheets[0];

  if (!worksheet) {
    if (sheetName) {
      throw new ReadError(
        ErrorCodes.SHEET_NOT_FOUND,
        `Worksheet "${sheetName}" not found in ${label}.`
      );
    }
    throw new ReadError(ErrorCodes.INPUT_UNPARSABLE, `No worksheet found in ${label}.`);
  }

  const headerRow = worksheet.getRow(1);
  const width = headerRow.cellCount;
  if (width === 0) {
    return { columns: [], rows: [] };
  }

  const readCells = (row: ExcelJS.Row): string[] => {
    const cells: string[] = [];
    for (let col = 1; col <= width; col++) {
      cells.push(cellToText(row.getCell(col).value));
    }
    return cells;
  };

  const columns = readCells(headerRow);
  const rows: string[][] = [];

  for (let rowIndex = 2; rowIndex <= worksheet.rowCount; rowIndex++) {
    const cells = readCells(worksheet.getRow(rowIndex));
    if (isRowEmpty(cells)) continue;
    rows.push(cells);
  }

  return { columns, rows };
}

// ------------------------------------------------------------
// Entry points
// ------------------------------------------------------------

/**
 * Parse an in-memory file. `kind` wins over the file name extension.
 */
export async function parseInputBuffer(
  buffer: Buffer,
  options: ParseInputOptions = {}
): Promise<RawTable> {
  const label = options.fileName ? `"${options.fileName}"` : 'input file';
  const kind = options.kind ?? (options.fileName ? inferInputKind(options.fileName) : null);

  switch (kind) {
    case 'csv':
      return parseDelimited(buffer, ',', label);
    case 'tsv':
      return parseDelimited(buffer, '\t', label);
    case 'xlsx':
      return parseWorkbook(buffer, options.sheetName, label);
    default:
      throw new ReadError(
        ErrorCodes.UNSUPPORTED_FILE_KIND,
        `Input file ${label} must be CSV, TSV or XLSX.`
      );
  }
}

export async function readInputFile(
  filePath: string,
  options: ReadInputOptions = {}
): Promise<RawTable> {
  const fileName = path.basename(filePath);
  const kind = options.kind ?? inferInputKind(fileName);

  if (!kind) {
    throw new ReadError(
      ErrorCodes.UNSUPPORTED_FILE_KIND,
      `Input file "${fileName}" must be CSV, TSV or XLSX.`
    );
  }

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err) {
    throw new ReadError(
      ErrorCodes.INPUT_FILE_NOT_FOUND,
      `Input file "${filePath}" not found or unreadable.`,
      { cause: err }
    );
  }

  return parseInputBuffer(buffer, { ...options, kind, fileName });
}
