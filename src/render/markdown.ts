import { formatGeneratedAt } from '../lib/dates.js';
import { headerCells, rowCells, type TableColumn } from '../lib/printer.js';
import type { IssueRecord } from '../services/issue-record.js';
import { formatDate, formatTimestampLink, markdownLink, statusCell } from './cells.js';
import type { RenderOptions } from './types.js';

function markdownColumns(options: RenderOptions): TableColumn<IssueRecord>[] {
  const lastUpdate: TableColumn<IssueRecord> = {
    header: 'last update',
    value: (issue) =>
      formatTimestampLink(issue.comment.created, issue.comment.url, {
        daysAgo: options.relativeDates === true,
        now: options.now ?? options.generatedAt,
      }),
  };
  const columns: TableColumn<IssueRecord>[] = [
    { header: 'status', value: statusCell },
    { header: 'issue', value: (issue) => markdownLink(issue.summary, issue.url) },
    { header: 'assignee', value: (issue) => issue.assignee },
    { header: 'target date', value: (issue) => formatDate(issue.targetEnd) },
    lastUpdate,
  ];
  if (options.showChildren) {
    columns.splice(1, 0, { header: 'parent', value: (issue) => markdownLink(issue.parentKey, issue.parentURL) });
  }
  return columns;
}

function pipeRow(cells: string[]): string {
  return `| ${cells.join(' | ')} |`;
}

export function renderMarkdown(issues: readonly IssueRecord[], options: RenderOptions): string {
  const columns = markdownColumns(options);
  const alignment = `|---|${':--|'.repeat(columns.length - 1)}`;

  const lines = [
    `\n### ${options.title}`,
    `* generated at: ${formatGeneratedAt(options.generatedAt)}`,
    `* row count: ${issues.length}`,
    `\n${pipeRow(headerCells(columns))}`,
    alignment,
    ...issues.map((issue) => pipeRow(rowCells(issue, columns))),
    '\n',
  ];
  return lines.join('\n');
}
