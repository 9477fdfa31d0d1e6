import { describe, it, expect } from 'vitest';
import {
  addDays,
  diffDays,
  eachDay,
  isIsoDate,
  isoWeekday,
  monthDays,
  monthEnd,
  parseMonth,
  sameDayLastYear,
  shiftMonth,
  startOfIsoWeek,
} from '../utils/calendar';
import { ValidationError } from '../errors';

describe('calendar helpers', () => {
  it('eachDay is inclusive and crosses month ends', () => {
    expect(eachDay('2025-02-27', '2025-03-02')).toEqual([
      '2025-02-27',
      '2025-02-28',
      '2025-03-01',
      '2025-03-02',
    ]);
  });

  it('eachDay returns nothing for an inverted range', () => {
    expect(eachDay('2025-03-02', '2025-03-01')).toEqual([]);
  });

  it('adds and diffs days', () => {
    expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
    expect(addDays('2025-03-01', -1)).toBe('2025-02-28');
    expect(diffDays('2025-01-01', '2025-03-01')).toBe(59);
  });

  it('uses Monday = 1 through Sunday = 7', () => {
    expect(isoWeekday('2025-03-10')).toBe(1);
    expect(isoWeekday('2025-03-16')).toBe(7);
    expect(startOfIsoWeek('2025-03-13')).toBe('2025-03-10');
    expect(startOfIsoWeek('2025-03-16')).toBe('2025-03-10');
  });

  it('parses months and rejects bad ones', () => {
    expect(parseMonth('2025-3')).toBe('2025-03-01');
    expect(parseMonth(' 2025-11 ')).toBe('2025-11-01');
    expect(() => parseMonth('2025-13')).toThrow(ValidationError);
    expect(() => parseMonth('March')).toThrow(ValidationError);
  });

  it('shifts months across year boundaries', () => {
    expect(shiftMonth('2025-01-15', -1)).toBe('2024-12-01');
    expect(shiftMonth('2024-12-31', 1)).toBe('2025-01-01');
    expect(monthEnd('2024-02-10')).toBe('2024-02-29');
    expect(monthDays('2025-02-01')).toHaveLength(28);
  });

  it('maps leap days to Feb 28 of the prior year', () => {
    expect(sameDayLastYear('2024-02-29')).toBe('2023-02-28');
    expect(sameDayLastYear('2025-06-15')).toBe('2024-06-15');
  });

  it('validates ISO dates', () => {
    expect(isIsoDate('2025-02-28')).toBe(true);
    expect(isIsoDate('2025-02-30')).toBe(false);
    expect(isIsoDate('20250228')).toBe(false);
  });
});
