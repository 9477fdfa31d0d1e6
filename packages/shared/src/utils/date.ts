import type { IsoDate } from './calendar';
import { addDays } from './calendar';

export function nowUTC(): string {
  return new Date().toISOString();
}

export interface ZonedDateParts {
  date: IsoDate;
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export type ZonedFormatter = (instant: Date) => ZonedDateParts;

/**
 * Builds a reusable wall-clock reader for one IANA timezone. Constructing an
 * Intl formatter is comparatively slow, so hot loops should create one per run.
 */
export function createZonedFormatter(timezone: string): ZonedFormatter {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: timezone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });

  return (instant: Date): ZonedDateParts => {
    const fields = new Map<string, number>();
    for (const part of formatter.formatToParts(instant)) {
      if (part.type !== 'literal') fields.set(part.type, Number(part.value));
    }
    const year = fields.get('year') ?? 0;
    const month = fields.get('month') ?? 1;
    const day = fields.get('day') ?? 1;
    return {
      date: `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`,
      year,
      month,
      day,
      hour: (fields.get('hour') ?? 0) % 24,
      minute: fields.get('minute') ?? 0,
      second: fields.get('second') ?? 0,
    };
  };
}

export function toBusinessDate(instant: Date, timezone: string): IsoDate {
  return createZonedFormatter(timezone)(instant).date;
}

/** The business date `days` before the one containing `instant` (1 = yesterday). */
export function businessDaysAgo(instant: Date, timezone: string, days: number): IsoDate {
  return addDays(toBusinessDate(instant, timezone), -days);
}

function offsetMs(instant: Date, read: ZonedFormatter): number {
  const p = read(instant);
  const wall = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  return wall - Math.floor(instant.getTime() / 1000) * 1000;
}

/** Start of the local hour that contains `instant`. */
export function floorToZonedHour(instant: Date, read: ZonedFormatter): Date {
  const p = read(instant);
  return new Date(
    instant.getTime() - p.minute * 60_000 - p.second * 1000 - instant.getUTCMilliseconds(),
  );
}

const HAS_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const COMPACT_OFFSET = /([+-]\d{2})(\d{2})$/;
const LOCAL_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;

/**
 * Parses an ISO-like timestamp. Values that carry an offset keep it; values
 * without one are read as wall-clock time in `timezone`.
 *
 * Returns null for anything unparseable.
 */
export function parseZonedDateTime(value: string, timezone: string): Date | null {
  const normalized = value.trim().replace(' ', 'T');
  if (!normalized) return null;

  if (normalized.includes('T') && HAS_OFFSET.test(normalized)) {
    const parsed = new Date(normalized.replace(COMPACT_OFFSET, '$1:$2'));
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  const match = LOCAL_DATE_TIME.exec(normalized);
  if (!match) return null;
  const [, y, mo, d, h, mi, s, frac] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h ?? 0);
  const minute = Number(mi ?? 0);
  const second = Number(s ?? 0);
  const millis = frac ? Number(frac.slice(0, 3).padEnd(3, '0')) : 0;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const wall = Date.UTC(year, month - 1, day, hour, minute, second, millis);
  const check = new Date(wall);
  if (check.getUTCMonth() !== month - 1 || check.getUTCDate() !== day) return null;

  const read = createZonedFormatter(timezone);
  const guess = wall - offsetMs(new Date(wall), read);
  return new Date(wall - offsetMs(new Date(guess), read));
}
