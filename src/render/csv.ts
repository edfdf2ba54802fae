import { headerCells, rowCells, type TableColumn } from '../lib/printer.js';
import type { IssueRecord } from '../services/issue-record.js';
import { formatDate, statusCell } from './cells.js';
import type { RenderOptions } from './types.js';

// Issue titles are full of commas; a glyph that never shows up in them keeps
// most fields unquoted.
export const CSV_SEPARATOR = '🐱';

export function escapeCsvField(value: string): string {
  if (value.includes(CSV_SEPARATOR) || value.includes('\n') || value.includes('"')) {
    return `"${value.replaceAll('"', '""')}"`;
  }
  return value;
}

function csvColumns(showChildren: boolean): TableColumn<IssueRecord>[] {
  return [
    { header: 'status', value: statusCell },
    ...(showChildren ? [{ header: 'parent', value: (issue: IssueRecord) => issue.parentKey }] : []),
    { header: 'issue', value: (issue) => issue.summary },
    { header: 'assignee', value: (issue) => issue.assignee },
    { header: 'target date', value: (issue) => formatDate(issue.targetEnd) },
    { header: 'last update', value: (issue) => issue.comment.created || 'N/A' },
  ];
}

function csvLine(cells: string[]): string {
  return cells.map(escapeCsvField).join(CSV_SEPARATOR);
}

export function renderCsv(issues: readonly IssueRecord[], options: Pick<RenderOptions, 'showChildren'>): string {
  const columns = csvColumns(options.showChildren);
  return [csvLine(headerCells(columns)), ...issues.map((issue) => csvLine(rowCells(issue, columns)))].join('\n');
}
