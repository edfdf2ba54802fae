import { tryParseTrackerDate } from '../lib/dates.js';
import { createLogger, type Logger } from '../logger.js';
import type { IssueRecord } from './issue-record.js';
import { statusPriority } from './status-classifier.js';

export interface SelectionFilters {
  /** Keep issues updated at or after this instant. */
  since?: Date;
  /** Drop issues that received a comment after this instant. */
  noCommentSince?: Date;
}

/** Sorts after every real `YYYY-MM-DD` value. */
const NO_TARGET_SENTINEL = '9999-99-99';

const defaultLogger = createLogger();

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Status priority, then target date (missing last), then raw `updated`, then summary. */
export function compareIssues(a: IssueRecord, b: IssueRecord): number {
  const byStatus = statusPriority(a.statusName) - statusPriority(b.statusName);
  if (byStatus !== 0) return byStatus;

  const byTarget = compareStrings(a.targetEnd || NO_TARGET_SENTINEL, b.targetEnd || NO_TARGET_SENTINEL);
  if (byTarget !== 0) return byTarget;

  const byUpdated = compareStrings(a.updated, b.updated);
  if (byUpdated !== 0) return byUpdated;

  return compareStrings(a.summary, b.summary);
}

function updatedOnOrAfter(record: IssueRecord, since: Date, logger: Logger): boolean {
  const timestamp = record.updated;
  if (timestamp === '' || timestamp === 'N/A') {
    return false;
  }
  const parsed = tryParseTrackerDate(timestamp);
  if (!parsed) {
    logger.warn(`Could not parse date '${timestamp}' on ${record.key}`);
    return false;
  }
  return parsed.instant.getTime() >= since.getTime();
}

function quietSince(record: IssueRecord, cutoff: Date): boolean {
  if (record.comment.created === '') {
    return true;
  }
  const parsed = tryParseTrackerDate(record.comment.created);
  return !parsed || parsed.instant.getTime() <= cutoff.getTime();
}

export function selectIssues(
  records: readonly IssueRecord[],
  filters: SelectionFilters = {},
  logger: Logger = defaultLogger,
): IssueRecord[] {
  const { since, noCommentSince } = filters;
  const kept = records.filter((record) => {
    if (since && !updatedOnOrAfter(record, since, logger)) return false;
    if (noCommentSince && !quietSince(record, noCommentSince)) return false;
    return true;
  });
  logger.debug(`Filtered ${records.length - kept.length} issues`);
  return kept.sort(compareIssues);
}
