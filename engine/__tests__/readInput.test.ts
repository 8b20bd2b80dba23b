import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';

import { ReadError } from '../errors';
import { inferInputKind, parseInputBuffer, readInputFile } from '../readInput';

async function xlsxBuffer(build: (wb: ExcelJS.Workbook) => void): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  build(workbook);
  return Buffer.from(await workbook.xlsx.writeBuffer());
}

describe('inferInputKind', () => {
  it('maps extensions case-insensitively', () => {
    expect(inferInputKind('aps.CSV')).toBe('csv');
    expect(inferInputKind('aps.tsv')).toBe('tsv');
    expect(inferInputKind('aps.xlsx')).toBe('xlsx');
    expect(inferInputKind('aps.xls')).toBeNull();
  });
});

describe('parseInputBuffer (delimited)', () => {
  it('keeps numeric-looking values as text', async () => {
    const csv = 'Floor #,Serial Number,Mac Address\n03,00123,001122334455\n';
    const table = await parseInputBuffer(Buffer.from(csv), { kind: 'csv' });

    expect(table.columns).toEqual(['Floor #', 'Serial Number', 'Mac Address']);
    expect(table.rows).toEqual([['03', '00123', '001122334455']]);
  });

  it('strips a BOM, skips blank lines and tolerates ragged rows', async () => {
    const csv = '\uFEFFa,b\n1,2\n\n3\n';
    const table = await parseInputBuffer(Buffer.from(csv), { fileName: 'aps.csv' });

    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([['1', '2'], ['3']]);
  });

  it('reads tab-separated files', async () => {
    const table = await parseInputBuffer(Buffer.from('a\tb\nx y\tz\n'), { fileName: 'aps.tsv' });

    expect(table.rows).toEqual([['x y', 'z']]);
  });

  it('returns an empty table for an empty file', async () => {
    const table = await parseInputBuffer(Buffer.from(''), { kind: 'csv' });

    expect(table).toEqual({ columns: [], rows: [] });
  });

  it('rejects unsupported kinds', async () => {
    await expect(parseInputBuffer(Buffer.from('x'), { fileName: 'aps.xls' })).rejects.toMatchObject({
      name: 'ReadError',
      code: 'E102'
    });
  });
});

describe('parseInputBuffer (xlsx)', () => {
  it('reads the first worksheet with every cell as text and skips empty rows', async () => {
    const buffer = await xlsxBuffer((wb) => {
      const sheet = wb.addWorksheet('APs');
      sheet.addRow(['Floor #', 'Serial Number', 'Installed']);
      sheet.addRow([3, 'A1B2', new Date(Date.UTC(2025, 0, 15))]);
      sheet.addRow([]);
      sheet.addRow([4, 1234567, null]);
    });

    const table = await parseInputBuffer(buffer, { kind: 'xlsx' });

    expect(table.columns).toEqual(['Floor #', 'Serial Number', 'Installed']);
    expect(table.rows).toEqual([
      ['3', 'A1B2', '2025-01-15'],
      ['4', '1234567', '']
    ]);
  });

  it('reads a hyperlink cell whose label is rich text', async () => {
    // exceljs types a hyperlink label as a string; formatted labels load as rich text.
    const linked: ExcelJS.CellValue = JSON.parse(
      JSON.stringify({
        text: { richText: [{ text: 'SN-' }, { font: { bold: true }, text: '1' }] },
        hyperlink: 'https://inventory.test/devices/SN-1'
      })
    );
    const buffer = await xlsxBuffer((wb) => {
      const sheet = wb.addWorksheet('APs');
      sheet.addRow(['Serial Number']);
      sheet.getCell('A2').value = linked;
    });

    const table = await parseInputBuffer(buffer, { kind: 'xlsx' });

    expect(table.rows).toEqual([['SN-1']]);
  });

  it('reads the named sheet', async () => {
    const buffer = await xlsxBuffer((wb) => {
      wb.addWorksheet('Cover').addRow(['nothing here']);
      const sheet = wb.addWorksheet('APs');
      sheet.addRow(['Serial Number']);
      sheet.addRow(['SN-1']);
    });

    const table = await parseInputBuffer(buffer, { kind: 'xlsx', sheetName: 'APs' });

    expect(table).toEqual({ columns: ['Serial Number'], rows: [['SN-1']] });
  });

  it('fails with ReadError when the named sheet does not exist', async () => {
    const buffer = await xlsxBuffer((wb) => {
      wb.addWorksheet('APs').addRow(['Serial Number']);
    });

    const read = parseInputBuffer(buffer, { kind: 'xlsx', sheetName: 'Missing' });

    await expect(read).rejects.toBeInstanceOf(ReadError);
    await expect(read).rejects.toMatchObject({ code: 'E103' });
  });

  it('fails with ReadError when the bytes are not a workbook', async () => {
    await expect(
      parseInputBuffer(Buffer.from('not a zip'), { kind: 'xlsx' })
    ).rejects.toMatchObject({ code: 'E104' });
  });
});

describe('readInputFile', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ap-read-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads a CSV from disk', async () => {
    const file = path.join(dir, 'aps.csv');
    await fs.writeFile(file, 'Serial Number\nSN-1\n');

    await expect(readInputFile(file)).resolves.toEqual({
      columns: ['Serial Number'],
      rows: [['SN-1']]
    });
  });

  it('fails with ReadError when the file is absent', async () => {
    await expect(readInputFile(path.join(dir, 'missing.csv'))).rejects.toMatchObject({
      name: 'ReadError',
      code: 'E101'
    });
  });

  it('fails with ReadError for an unsupported extension before touching the disk', async () => {
    await expect(readInputFile(path.join(dir, 'missing.pdf'))).rejects.toMatchObject({
      code: 'E102'
    });
  });
});
