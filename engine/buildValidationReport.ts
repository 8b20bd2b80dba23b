// engine/buildValidationReport.ts
//
// Annotated diagnostic table for a blocked run: the normalized input plus
// issue / issue_field / issue_value, each pipe-joined per row.

import {
  COLUMN_ISSUE,
  COLUMN_ISSUE_FIELD,
  COLUMN_ISSUE_VALUE,
  ISSUE_JOINER
} from './constants';
import type { Issue, NormalizedTable, ReportTable } from './types';

const ISSUE_COLUMNS = [COLUMN_ISSUE, COLUMN_ISSUE_FIELD, COLUMN_ISSUE_VALUE];

export function groupIssuesByRow(issues: readonly Issue[]): Map<number, Issue[]> {
  const byRow = new Map<number, Issue[]>();
  for (const issue of issues) {
    const key = issue.row > 0 ? issue.row : 0;
    const bucket = byRow.get(key);
    if (bucket) bucket.push(issue);
    else byRow.set(key, [issue]);
  }
  return byRow;
}

function issueCells(issues: readonly Issue[] | undefined): string[] {
  if (!issues || issues.length === 0) return ['', '', ''];
  return [
    issues.map((i) => i.message).join(ISSUE_JOINER),
    issues.map((i) => i.field).join(ISSUE_JOINER),
    issues.map((i) => i.value).join(ISSUE_JOINER)
  ];
}

/**
 * Header-level issues (row 0):
 *  - with no data rows, the report is a single row holding only the three
 *    issue columns;
 *  - with data rows, they go in a trailing row whose data cells are blank.
 */
export function buildValidationReport(
  table: NormalizedTable,
  issues: readonly Issue[]
): ReportTable {
  const byRow = groupIssuesByRow(issues);
  const headerIssues = byRow.get(0);

  if (table.rows.length === 0 && headerIssues) {
    return { columns: [...ISSUE_COLUMNS], rows: [issueCells(headerIssues)] };
  }

  const rows = table.rows.map((cells, index) => [
    ...cells,
    ...issueCells(byRow.get(index + 1))
  ]);

  if (headerIssues) {
    rows.push([...table.columns.map(() => ''), ...issueCells(headerIssues)]);
  }

  return { columns: [...table.columns, ...ISSUE_COLUMNS], rows };
}
