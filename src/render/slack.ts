import type { IssueRecord } from '../services/issue-record.js';
import { formatDate, markdownLink } from './cells.js';

/** Numbered list that pastes cleanly into a chat message. */
export function renderSlack(issues: readonly IssueRecord[]): string {
  return issues
    .map((issue, index) => {
      const line = `${index + 1}. ${issue.emoji} ${markdownLink(issue.summary, issue.url)}, (due ${formatDate(issue.targetEnd)})`;
      return issue.comment.url ? `${line} (${markdownLink('last update', issue.comment.url)})` : line;
    })
    .join('\n');
}
