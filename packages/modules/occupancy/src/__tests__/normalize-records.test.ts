import { describe, it, expect } from 'vitest';
import { classifyAttendance, normalizeVisitRecords, toInteger } from '../normalize/normalize-records';

const options = { timezone: 'Europe/Moscow', now: () => new Date('2025-03-11T00:00:00Z') };

describe('toInteger', () => {
  it('accepts numbers and numeric strings only', () => {
    expect(toInteger(7)).toBe(7);
    expect(toInteger(' 42 ')).toBe(42);
    expect(toInteger('-1')).toBe(-1);
    expect(toInteger('4.5')).toBeNull();
    expect(toInteger(null)).toBeNull();
    expect(toInteger(Number.NaN)).toBeNull();
  });
});

describe('classifyAttendance', () => {
  it('treats 1 and 2 as fact visits', () => {
    expect(classifyAttendance(1)).toBe('fact');
    expect(classifyAttendance(2)).toBe('fact');
    expect(classifyAttendance(0)).toBe('non_fact');
    expect(classifyAttendance(-1)).toBe('non_fact');
  });
});

describe('normalizeVisitRecords', () => {
  it('reads a local start time in the configured timezone', () => {
    const [visit] = normalizeVisitRecords(101, [
      {
        id: 1,
        staff_id: 10,
        datetime: '2025-03-10 10:30:00',
        seance_length: 5400,
        attendance: 1,
        last_change_date: '2025-03-10T12:00:00+03:00',
      },
    ], options);

    expect(visit).toEqual({
      branchId: 101,
      staffId: 10,
      recordId: 1,
      start: new Date('2025-03-10T07:30:00Z'),
      end: new Date('2025-03-10T09:00:00Z'),
      attendanceCode: 1,
      attendanceClass: 'fact',
      updatedAt: '2025-03-10T12:00:00+03:00',
    });
  });

  it('falls back to the secondary attendance, start and duration fields', () => {
    const [visit] = normalizeVisitRecords(101, [
      {
        id: '2',
        staff_id: '11',
        date: '2025-03-10T12:00:00+03:00',
        length: '3600',
        visit_attendance: '2',
        create_date: '2025-03-01 09:00:00',
      },
    ], options);

    expect(visit?.staffId).toBe(11);
    expect(visit?.attendanceCode).toBe(2);
    expect(visit?.start.toISOString()).toBe('2025-03-10T09:00:00.000Z');
    expect(visit?.end.toISOString()).toBe('2025-03-10T10:00:00.000Z');
    expect(visit?.updatedAt).toBe('2025-03-01 09:00:00');
  });

  it('drops records that are not usable fact visits', () => {
    const result = normalizeVisitRecords(101, [
      { id: 3, staff_id: 10, datetime: '2025-03-10 10:00:00', attendance: 0 },
      { id: 4, staff_id: 10, datetime: '2025-03-10 10:00:00', attendance: -1 },
      { id: 5, datetime: '2025-03-10 10:00:00', attendance: 1 },
      { staff_id: 10, datetime: '2025-03-10 10:00:00', attendance: 1 },
      { id: 6, staff_id: 10, datetime: 'not a date', attendance: 1 },
      { id: 7, staff_id: 10, attendance: 1 },
      { id: 8, staff_id: 10, datetime: '2025-03-10 10:00:00', attendance: 'yes' },
      'garbage',
      null,
    ], options);

    expect(result).toEqual([]);
  });

  it('defaults missing or negative durations to a zero-length visit', () => {
    const result = normalizeVisitRecords(101, [
      { id: 9, staff_id: 10, datetime: '2025-03-10 10:00:00', attendance: 1 },
      { id: 10, staff_id: 10, datetime: '2025-03-10 11:00:00', seance_length: -600, attendance: 1 },
    ], options);

    expect(result.map((v) => v.end.getTime() - v.start.getTime())).toEqual([0, 0]);
    expect(result[0]?.updatedAt).toBe('2025-03-11T00:00:00.000Z');
  });

  it('keeps the last payload for a repeated record id', () => {
    const result = normalizeVisitRecords(101, [
      { id: 11, staff_id: 10, datetime: '2025-03-10 10:00:00', seance_length: 3600, attendance: 1 },
      { id: 11, staff_id: 12, datetime: '2025-03-10 14:00:00', seance_length: 3600, attendance: 1 },
    ], options);

    expect(result).toHaveLength(1);
    expect(result[0]?.staffId).toBe(12);
    expect(result[0]?.start.toISOString()).toBe('2025-03-10T11:00:00.000Z');
  });
});
