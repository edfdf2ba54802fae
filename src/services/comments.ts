import { getString, type PlainObject } from '../utils/object.js';
import type { IssueComment, IssueRecord } from './issue-record.js';

/** Issue key to the raw payload of its most recent comment. */
export type LatestCommentMap = ReadonlyMap<string, PlainObject>;

/**
 * The comment with the greatest `created` timestamp, compared as strings.
 * The first of several equal timestamps wins.
 */
export function findLatestComment(comments: readonly PlainObject[]): PlainObject | undefined {
  return comments.reduce<PlainObject | undefined>((latest, comment) => {
    if (!latest) return comment;
    return getString(comment, 'created') > getString(latest, 'created') ? comment : latest;
  }, undefined);
}

export function commentPermalink(issueUrl: string, commentId: string): string {
  return `${issueUrl}?focusedId=${commentId}&page=com.atlassian.jira.plugin.system.issuetabpanels%3Acomment-tabpanel#comment-${commentId}`;
}

export function toIssueComment(issueUrl: string, raw: PlainObject): IssueComment {
  const id = getString(raw, 'id');
  return {
    url: commentPermalink(issueUrl, id),
    // An edited comment counts as activity at its edit time.
    created: getString(raw, 'updated') || getString(raw, 'created'),
  };
}

/**
 * Returns new records carrying their most recent comment. Records with no entry
 * in the map come back unchanged.
 */
export function attachComments(records: readonly IssueRecord[], latest: LatestCommentMap): IssueRecord[] {
  return records.map((record) => {
    const raw = latest.get(record.key);
    if (!raw) return record;
    return { ...record, comment: toIssueComment(record.url, raw) };
  });
}
