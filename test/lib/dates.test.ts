import { describe, expect, it } from 'vitest';
import {
  daysBefore,
  formatGeneratedAt,
  parseCalendarDate,
  parseTrackerDate,
  startOfUtcDay,
  tryParseTrackerDate,
  wholeDaysBetween,
} from '../../src/lib/dates.js';
import { ParseError, ValidationError } from '../../src/lib/errors.js';

describe('parseTrackerDate', () => {
  it('reads the tracker timestamp form with a compact offset', () => {
    const parsed = parseTrackerDate('2024-01-15T10:30:00.000+0000');
    expect(parsed.instant.toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(parsed.date).toBe('2024-01-15');
    expect(parsed.dateOnly).toBe(false);
  });

  it('applies negative and colon offsets', () => {
    const west = parseTrackerDate('2024-01-15T23:30:00.000-0700');
    expect(west.instant.toISOString()).toBe('2024-01-16T06:30:00.000Z');
    expect(west.date).toBe('2024-01-15');

    const east = parseTrackerDate('2024-03-01T08:00:00+05:30');
    expect(east.instant.toISOString()).toBe('2024-03-01T02:30:00.000Z');
  });

  it('reads Z timestamps and long fractions', () => {
    expect(parseTrackerDate('2024-01-15T10:30:00Z').instant.toISOString()).toBe('2024-01-15T10:30:00.000Z');
    expect(parseTrackerDate('2024-01-15T10:30:00.123456Z').instant.toISOString()).toBe('2024-01-15T10:30:00.123Z');
  });

  it('reads date-only values as UTC midnight', () => {
    const parsed = parseTrackerDate('2024-02-29');
    expect(parsed.dateOnly).toBe(true);
    expect(parsed.date).toBe('2024-02-29');
    expect(parsed.instant.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it.each(['yesterday', '2023-02-29', '2024-13-01', '2024-01-15T25:00:00Z', '2024-01-15T10:30:00', '15/01/2024'])(
    'rejects %s',
    (input) => {
      expect(() => parseTrackerDate(input)).toThrow(ParseError);
    },
  );

  it('keeps the rejected input on the error', () => {
    try {
      parseTrackerDate('soon');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      expect(error instanceof ParseError ? error.input : '').toBe('soon');
    }
  });
});

describe('tryParseTrackerDate', () => {
  it('returns undefined instead of throwing', () => {
    expect(tryParseTrackerDate('')).toBeUndefined();
    expect(tryParseTrackerDate('N/A')).toBeUndefined();
    expect(tryParseTrackerDate('2024-06-01')?.date).toBe('2024-06-01');
  });
});

describe('parseCalendarDate', () => {
  it('returns midnight UTC', () => {
    expect(parseCalendarDate('2025-01-01').toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('rejects other shapes with a validation error', () => {
    expect(() => parseCalendarDate('2025/01/01')).toThrow(ValidationError);
    expect(() => parseCalendarDate('2025/01/01')).toThrow("Invalid date format '2025/01/01'. Expected YYYY-MM-DD.");
    expect(() => parseCalendarDate('2025-02-30')).toThrow(ValidationError);
  });
});

describe('day arithmetic', () => {
  it('truncates to the UTC day', () => {
    expect(startOfUtcDay(new Date('2024-05-05T17:45:00Z')).toISOString()).toBe('2024-05-05T00:00:00.000Z');
  });

  it('steps back whole days', () => {
    expect(daysBefore(new Date('2024-06-10T12:00:00Z'), 7).toISOString()).toBe('2024-06-03T12:00:00.000Z');
  });

  it('counts whole days elapsed', () => {
    expect(wholeDaysBetween(new Date('2024-01-01T00:00:00Z'), new Date('2024-01-03T12:00:00Z'))).toBe(2);
    expect(wholeDaysBetween(new Date('2024-01-01T00:00:00Z'), new Date('2024-01-01T23:59:59Z'))).toBe(0);
  });

  it('formats the generated-at stamp at second precision', () => {
    expect(formatGeneratedAt(new Date('2024-06-01T09:15:30.123Z'))).toBe('2024-06-01T09:15:30Z');
  });
});
