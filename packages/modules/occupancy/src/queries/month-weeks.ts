import { addDays, monthEnd, parseMonth, startOfIsoWeek } from '@hourwise/shared';
import type { IsoDate } from '@hourwise/shared';

/** Monday of every ISO week touching the month, in order. */
export function listMonthWeeks(month: string): IsoDate[] {
  const first = parseMonth(month);
  const last = monthEnd(first);
  const weeks: IsoDate[] = [];
  for (let current = startOfIsoWeek(first); current <= last; current = addDays(current, 7)) {
    weeks.push(current);
  }
  return weeks;
}
