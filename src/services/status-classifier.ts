import { startOfUtcDay, tryParseTrackerDate } from '../lib/dates.js';

export type StatusBucket = 'done' | 'in progress' | 'at risk' | 'off track' | 'not started' | 'unknown';

export const BUCKET_EMOJI: Record<StatusBucket, string> = {
  done: '🟣',
  'in progress': '🟢',
  'at risk': '🟡',
  'off track': '🔴',
  'not started': '⚪',
  unknown: '❓',
};

export const OFF_TRACK_EMOJI = BUCKET_EMOJI['off track'];

/** Known statuses in sort order (active work, then finished, then not started); the index is the sort priority. */
export const STATUS_ORDER = [
  { name: 'in progress', bucket: 'in progress' },
  { name: 'at risk', bucket: 'at risk' },
  { name: 'off track', bucket: 'off track' },
  { name: 'blocked', bucket: 'off track' },
  { name: 'done', bucket: 'done' },
  { name: 'closed', bucket: 'done' },
  { name: 'resolved', bucket: 'done' },
  { name: 'not started', bucket: 'not started' },
  { name: 'ready for work', bucket: 'not started' },
  { name: 'vetting', bucket: 'not started' },
  { name: 'new', bucket: 'not started' },
] as const satisfies ReadonlyArray<{ name: string; bucket: StatusBucket }>;

export const UNKNOWN_PRIORITY = 999;

interface StatusEntry {
  bucket: StatusBucket;
  priority: number;
}

const STATUS_INDEX = new Map<string, StatusEntry>(
  STATUS_ORDER.map((entry, index): [string, StatusEntry] => [entry.name, { bucket: entry.bucket, priority: index }]),
);

export function normalizeStatusName(status: string): string {
  return status.trim().toLowerCase();
}

export function statusBucket(status: string): StatusBucket {
  return STATUS_INDEX.get(normalizeStatusName(status))?.bucket ?? 'unknown';
}

export function statusEmoji(status: string): string {
  return BUCKET_EMOJI[statusBucket(status)];
}

export function statusPriority(status: string): number {
  return STATUS_INDEX.get(normalizeStatusName(status))?.priority ?? UNKNOWN_PRIORITY;
}

export function statusTrending(status: string): string {
  const normalized = normalizeStatusName(status);
  switch (statusBucket(normalized)) {
    case 'done':
      return 'done';
    case 'not started':
      return 'not started';
    default:
      return normalized;
  }
}

/**
 * Past its target date and not finished. Date-only targets are due through the
 * whole of that UTC day; timestamps are due at that instant. Values that do not
 * parse never count as overdue.
 */
export function isOverdue(status: string, targetEnd: string, now: Date = new Date()): boolean {
  if (statusBucket(status) === 'done') {
    return false;
  }
  if (targetEnd === '' || targetEnd === 'None') {
    return false;
  }
  const due = tryParseTrackerDate(targetEnd);
  if (!due) {
    return false;
  }
  if (due.dateOnly) {
    return startOfUtcDay(now).getTime() > due.instant.getTime();
  }
  return now.getTime() > due.instant.getTime();
}

export interface StatusClassification {
  emoji: string;
  trending: string;
}

export function classifyStatus(status: string, targetEnd: string, now: Date = new Date()): StatusClassification {
  if (isOverdue(status, targetEnd, now)) {
    return { emoji: OFF_TRACK_EMOJI, trending: 'overdue' };
  }
  return { emoji: statusEmoji(status), trending: statusTrending(status) };
}
