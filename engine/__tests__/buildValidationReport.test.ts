import { buildValidationReport, groupIssuesByRow } from '../buildValidationReport';
import type { Issue, NormalizedTable } from '../types';

const table: NormalizedTable = {
  columns: ['floor #', 'wap hostname', 'serial number', 'mac address'],
  rows: [
    ['1', 'ap-1', 'SN-1', ''],
    ['1', 'ap-2', '', ''],
    ['2', 'ap-3', 'SN-3', 'aa:bb']
  ]
};

const issue = (row: number, field: string, value: string, message: string): Issue => ({
  row,
  field,
  value,
  message,
  code: 'E401'
});

describe('buildValidationReport', () => {
  it('appends the three issue columns and fills only rows with issues', () => {
    const report = buildValidationReport(table, [
      issue(2, 'serial number', '', 'blank'),
      issue(3, 'mac address', 'aa:bb', 'format invalid')
    ]);

    expect(report.columns).toEqual([
      'floor #',
      'wap hostname',
      'serial number',
      'mac address',
      'issue',
      'issue_field',
      'issue_value'
    ]);
    expect(report.rows).toEqual([
      ['1', 'ap-1', 'SN-1', '', '', '', ''],
      ['1', 'ap-2', '', '', 'blank', 'serial number', ''],
      ['2', 'ap-3', 'SN-3', 'aa:bb', 'format invalid', 'mac address', 'aa:bb']
    ]);
  });

  it('pipe-joins several issues on the same row', () => {
    const report = buildValidationReport(table, [
      issue(1, 'serial number', 'SN-1', 'not found in inventory'),
      issue(1, 'mac address', 'x', 'format invalid')
    ]);

    expect(report.rows[0].slice(4)).toEqual([
      'not found in inventory | format invalid',
      'serial number | mac address',
      'SN-1 | x'
    ]);
  });

  it('degenerates to a single issue-only row for a header issue with no data rows', () => {
    const report = buildValidationReport({ columns: ['floor #', 'serial number'], rows: [] }, [
      issue(0, 'headers', 'wap hostname, mac address', 'Missing required column(s)')
    ]);

    expect(report).toEqual({
      columns: ['issue', 'issue_field', 'issue_value'],
      rows: [['Missing required column(s)', 'headers', 'wap hostname, mac address']]
    });
  });

  it('carries header issues in a trailing row when data rows exist', () => {
    const report = buildValidationReport(table, [issue(0, 'headers', 'x', 'Missing required column(s)')]);

    expect(report.rows).toHaveLength(4);
    expect(report.rows[3]).toEqual(['', '', '', '', 'Missing required column(s)', 'headers', 'x']);
  });
});

describe('groupIssuesByRow', () => {
  it('buckets negative row numbers with the header', () => {
    const grouped = groupIssuesByRow([issue(-1, 'a', '', 'm'), issue(0, 'b', '', 'n'), issue(2, 'c', '', 'o')]);

    expect([...grouped.keys()]).toEqual([0, 2]);
    expect(grouped.get(0)?.map((i) => i.field)).toEqual(['a', 'b']);
  });
});
