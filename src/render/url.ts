import type { IssueRecord } from '../services/issue-record.js';

export function deepLinkJql(keys: readonly string[]): string {
  return `key in (${keys.join(', ')}) order by assignee ASC`;
}

/**
 * One issue-navigator link listing every selected key. The tracker orders the
 * linked view by assignee; the client-side sort only decided which keys made it in.
 */
export function renderUrl(issues: readonly IssueRecord[], serverUrl: string): string {
  if (issues.length === 0) {
    return '';
  }
  const jql = deepLinkJql(issues.map((issue) => issue.key));
  const base = serverUrl.replace(/\/+$/, '');
  return `${base}/issues/?${new URLSearchParams({ jql }).toString()}`;
}
