import { createZonedFormatter, floorToZonedHour } from '@hourwise/shared';
import type { IsoDate, ZonedDateParts } from '@hourwise/shared';
import type { HourPolicy } from '../hour-policy';
import type { DateWindow, StaffHourFact, VisitInterval } from '../types';

const HOUR_MS = 3_600_000;

export interface HourBucket {
  date: IsoDate;
  hour: number;
}

export interface OccupancyOptions {
  timezone: string;
  hourPolicy: HourPolicy;
}

/**
 * Local (date, hour) buckets touched by [start, end): start is floored to
 * the top of its hour, then stepped one hour at a time while before `end`.
 */
export function expandIntervalHours(
  start: Date,
  end: Date,
  read: (instant: Date) => ZonedDateParts,
): HourBucket[] {
  const buckets: HourBucket[] = [];
  for (let t = floorToZonedHour(start, read).getTime(); t < end.getTime(); t += HOUR_MS) {
    const parts = read(new Date(t));
    buckets.push({ date: parts.date, hour: parts.hour });
  }
  return buckets;
}

function compareFacts(a: StaffHourFact, b: StaffHourFact): number {
  return a.staffId - b.staffId || (a.date < b.date ? -1 : a.date > b.date ? 1 : 0) || a.hour - b.hour;
}

/**
 * Busy facts for one branch and window. Overlapping visits of one staff
 * member collapse into a single fact; buckets outside the window are dropped.
 */
export function buildStaffHourFacts(
  branchId: number,
  intervals: readonly VisitInterval[],
  window: DateWindow,
  options: OccupancyOptions,
): StaffHourFact[] {
  const read = createZonedFormatter(options.timezone);
  const facts = new Map<string, StaffHourFact>();

  for (const interval of intervals) {
    if (interval.attendanceClass !== 'fact') continue;
    for (const { date, hour } of expandIntervalHours(interval.start, interval.end, read)) {
      if (date < window.from || date > window.to) continue;
      const key = `${interval.staffId}|${date}|${hour}`;
      if (facts.has(key)) continue;
      facts.set(key, {
        branchId,
        staffId: interval.staffId,
        date,
        hour,
        busy: true,
        inBenchmark: options.hourPolicy.inBenchmark(hour),
        inGray: options.hourPolicy.inGray(hour),
      });
    }
  }

  return [...facts.values()].sort(compareFacts);
}
