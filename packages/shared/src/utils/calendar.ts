import { ValidationError } from '../errors';

/** Calendar date in `YYYY-MM-DD` form. All arithmetic here is timezone-free. */
export type IsoDate = string;

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_MONTH = /^(\d{4})-(\d{1,2})$/;
const DAY_MS = 86_400_000;

function toUtcMs(date: IsoDate): number {
  const match = ISO_DATE.exec(date);
  if (!match) {
    throw new ValidationError(`Invalid date '${date}', expected YYYY-MM-DD`);
  }
  const [, y, m, d] = match;
  return Date.UTC(Number(y), Number(m) - 1, Number(d));
}

function fromUtcMs(ms: number): IsoDate {
  return new Date(ms).toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  return fromUtcMs(toUtcMs(value)) === value;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromUtcMs(toUtcMs(date) + days * DAY_MS);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function diffDays(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

/** Every date from `from` through `to`, inclusive. Empty when `to` precedes `from`. */
export function eachDay(from: IsoDate, to: IsoDate): IsoDate[] {
  const days: IsoDate[] = [];
  const end = toUtcMs(to);
  for (let ms = toUtcMs(from); ms <= end; ms += DAY_MS) {
    days.push(fromUtcMs(ms));
  }
  return days;
}

/** ISO weekday: Monday = 1 … Sunday = 7. */
export function isoWeekday(date: IsoDate): number {
  const day = new Date(toUtcMs(date)).getUTCDay();
  return day === 0 ? 7 : day;
}

export function startOfIsoWeek(date: IsoDate): IsoDate {
  return addDays(date, 1 - isoWeekday(date));
}

/** Parses `YYYY-MM` into the first day of that month. */
export function parseMonth(value: string): IsoDate {
  const match = ISO_MONTH.exec(value.trim());
  const month = match ? Number(match[2]) : NaN;
  if (!match || month < 1 || month > 12) {
    throw new ValidationError(`Invalid month '${value}', expected YYYY-MM`);
  }
  return `${match[1]}-${String(month).padStart(2, '0')}-01`;
}

export function formatMonth(date: IsoDate): string {
  return date.slice(0, 7);
}

export function monthStart(date: IsoDate): IsoDate {
  return `${date.slice(0, 7)}-01`;
}

/** First day of the month `delta` months away from the month containing `date`. */
export function shiftMonth(date: IsoDate, delta: number): IsoDate {
  const base = new Date(toUtcMs(monthStart(date)));
  return fromUtcMs(Date.UTC(base.getUTCFullYear(), base.getUTCMonth() + delta, 1));
}

export function monthEnd(date: IsoDate): IsoDate {
  return addDays(shiftMonth(date, 1), -1);
}

export function monthDays(date: IsoDate): IsoDate[] {
  return eachDay(monthStart(date), monthEnd(date));
}

/** Same calendar day one year earlier; Feb 29 maps to Feb 28. */
export function sameDayLastYear(date: IsoDate): IsoDate {
  const [y, m, d] = date.split('-').map(Number);
  const year = (y ?? 0) - 1;
  const month = m ?? 1;
  const lastDay = new Date(Date.UTC(year, month, 0)).getUTCDate();
  const day = Math.min(d ?? 1, lastDay);
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}
