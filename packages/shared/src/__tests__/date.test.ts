import { describe, it, expect } from 'vitest';
import {
  businessDaysAgo,
  createZonedFormatter,
  floorToZonedHour,
  parseZonedDateTime,
  toBusinessDate,
} from '../utils/date';

describe('parseZonedDateTime', () => {
  it('reads offset-less values as wall time in the given timezone', () => {
    expect(parseZonedDateTime('2025-03-10 10:30:00', 'Europe/Moscow')?.toISOString()).toBe(
      '2025-03-10T07:30:00.000Z',
    );
  });

  it('follows daylight saving time', () => {
    expect(parseZonedDateTime('2025-07-01 12:00:00', 'America/New_York')?.toISOString()).toBe(
      '2025-07-01T16:00:00.000Z',
    );
    expect(parseZonedDateTime('2025-01-15T12:00:00', 'America/New_York')?.toISOString()).toBe(
      '2025-01-15T17:00:00.000Z',
    );
  });

  it('keeps an explicit offset', () => {
    expect(parseZonedDateTime('2025-03-10T10:30:00+05:00', 'Europe/Moscow')?.toISOString()).toBe(
      '2025-03-10T05:30:00.000Z',
    );
    expect(parseZonedDateTime('2025-03-10T10:30:00+0500', 'UTC')?.toISOString()).toBe(
      '2025-03-10T05:30:00.000Z',
    );
  });

  it('treats a bare date as local midnight', () => {
    expect(parseZonedDateTime('2025-03-10', 'Europe/Moscow')?.toISOString()).toBe(
      '2025-03-09T21:00:00.000Z',
    );
  });

  it('returns null for garbage and impossible dates', () => {
    expect(parseZonedDateTime('garbage', 'UTC')).toBeNull();
    expect(parseZonedDateTime('', 'UTC')).toBeNull();
    expect(parseZonedDateTime('2025-02-30 10:00:00', 'UTC')).toBeNull();
    expect(parseZonedDateTime('2025-02-10 25:00:00', 'UTC')).toBeNull();
  });
});

describe('zoned formatting', () => {
  it('reads local wall-clock parts', () => {
    const read = createZonedFormatter('Europe/Moscow');
    const parts = read(new Date('2025-03-09T22:15:00Z'));
    expect(parts.date).toBe('2025-03-10');
    expect(parts.hour).toBe(1);
    expect(parts.minute).toBe(15);
  });

  it('floors to the local hour in half-hour offset zones', () => {
    const read = createZonedFormatter('Asia/Kolkata');
    const floored = floorToZonedHour(new Date('2025-03-10T04:45:00Z'), read);
    expect(floored.toISOString()).toBe('2025-03-10T04:30:00.000Z');
  });

  it('computes business dates', () => {
    const instant = new Date('2025-03-09T22:15:00Z');
    expect(toBusinessDate(instant, 'Europe/Moscow')).toBe('2025-03-10');
    expect(toBusinessDate(instant, 'UTC')).toBe('2025-03-09');
    expect(businessDaysAgo(instant, 'Europe/Moscow', 1)).toBe('2025-03-09');
  });
});
