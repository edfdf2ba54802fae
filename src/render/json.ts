import type { IssueRecord } from '../services/issue-record.js';

/** Full records in selection order; `comment` is always present. */
export function renderJson(issues: readonly IssueRecord[]): string {
  return JSON.stringify(issues, null, 2);
}
