import { tryParseTrackerDate, wholeDaysBetween } from '../lib/dates.js';
import { createLogger } from '../logger.js';
import type { IssueRecord } from '../services/issue-record.js';

const logger = createLogger();

export function formatDate(value: string): string {
  if (value === '') {
    return 'N/A';
  }
  return tryParseTrackerDate(value)?.date ?? value;
}

export interface TimestampLinkOptions {
  daysAgo?: boolean;
  now?: Date;
}

function describeDaysAgo(days: number): string {
  switch (days) {
    case 0:
      return ' (today)';
    case 1:
      return ' (1 day ago)';
    default:
      return ` (${days} days ago)`;
  }
}

export function formatTimestampLink(timestamp: string, url: string, options: TimestampLinkOptions = {}): string {
  if (timestamp === '' || timestamp === 'N/A' || url === '') {
    return 'N/A';
  }
  const parsed = tryParseTrackerDate(timestamp);
  if (!parsed) {
    logger.warn(`Could not format timestamp '${timestamp}'`);
    return timestamp;
  }
  const suffix = options.daysAgo
    ? describeDaysAgo(wholeDaysBetween(parsed.instant, options.now ?? new Date()))
    : '';
  return `[${parsed.date}${suffix}](${url})`;
}

export function statusCell(record: IssueRecord): string {
  return `${record.emoji} ${record.trending}`;
}

export function markdownLink(text: string, url: string): string {
  return `[${text}](${url})`;
}
