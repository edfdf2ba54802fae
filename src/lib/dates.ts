import { ParseError, ValidationError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// Accepts the shapes the tracker emits: `2024-01-15`, `2024-01-15T10:30:00Z`,
// `2024-01-15T10:30:00.000+0000` and the RFC 3339 `+00:00` offset form.
const TRACKER_DATE =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:?\d{2}))?$/;

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export interface TrackerDate {
  /** The absolute point in time; midnight UTC for date-only values. */
  instant: Date;
  /** The `YYYY-MM-DD` part as written, in the value's own offset. */
  date: string;
  dateOnly: boolean;
}

function validCalendarDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const probe = new Date(Date.UTC(year, month - 1, day));
  return probe.getUTCMonth() === month - 1 && probe.getUTCDate() === day;
}

function parseOffsetMinutes(zone: string): number | undefined {
  if (zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 23 || minutes > 59) return undefined;
  return sign * (hours * 60 + minutes);
}

export function parseTrackerDate(input: string): TrackerDate {
  const match = TRACKER_DATE.exec(input.trim());
  if (!match) {
    throw new ParseError(`could not parse date: ${input}`, input);
  }
  const [, y, mo, d, hh, mi, ss, fraction, zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  if (!validCalendarDay(year, month, day)) {
    throw new ParseError(`could not parse date: ${input}`, input);
  }
  const date = `${y}-${mo}-${d}`;

  if (hh === undefined || mi === undefined || ss === undefined || zone === undefined) {
    return { instant: new Date(Date.UTC(year, month - 1, day)), date, dateOnly: true };
  }

  const hours = Number(hh);
  const minutes = Number(mi);
  const seconds = Number(ss);
  const offset = parseOffsetMinutes(zone);
  if (hours > 23 || minutes > 59 || seconds > 59 || offset === undefined) {
    throw new ParseError(`could not parse date: ${input}`, input);
  }
  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;
  const local = Date.UTC(year, month - 1, day, hours, minutes, seconds, millis);
  return { instant: new Date(local - offset * 60_000), date, dateOnly: false };
}

/** Non-throwing variant for filters and classifiers, which fail open. */
export function tryParseTrackerDate(input: string): TrackerDate | undefined {
  if (!input) return undefined;
  try {
    return parseTrackerDate(input);
  } catch (error) {
    if (error instanceof ParseError) return undefined;
    throw error;
  }
}

/** Parses a `YYYY-MM-DD` command-line value to midnight UTC. */
export function parseCalendarDate(value: string): Date {
  const match = CALENDAR_DATE.exec(value.trim());
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    if (validCalendarDay(year, month, day)) {
      return new Date(Date.UTC(year, month - 1, day));
    }
  }
  throw new ValidationError(`Invalid date format '${value}'. Expected YYYY-MM-DD.`);
}

export function startOfUtcDay(value: Date): Date {
  return new Date(Math.floor(value.getTime() / DAY_MS) * DAY_MS);
}

export function daysBefore(value: Date, days: number): Date {
  return new Date(value.getTime() - days * DAY_MS);
}

/** Whole days elapsed from `from` to `to`, truncated toward zero. */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.trunc((to.getTime() - from.getTime()) / DAY_MS);
}

/** `2024-01-15T10:30:00Z`: second precision, always UTC. */
export function formatGeneratedAt(value: Date): string {
  return value.toISOString().replace(/\.\d{3}Z$/, 'Z');
}
