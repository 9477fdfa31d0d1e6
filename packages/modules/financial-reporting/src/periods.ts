import { addDays, eachDay, isoWeekday, monthEnd, monthStart, shiftMonth, startOfIsoWeek } from '@hourwise/shared';
import type { DateWindow, MetricSeries, MetricValues, SeriesByMetric } from './types';

const RATE_HINTS = ['percent', 'ratio', 'share'];

/** Rate metrics are averaged over a period; everything else is summed. */
export function isRateMetric(code: string): boolean {
  const lowered = code.toLowerCase();
  if (lowered.endsWith('_pct') || lowered.endsWith('_percent')) return true;
  return RATE_HINTS.some((hint) => lowered.includes(hint));
}

export interface WeekChunk {
  /** Index of the first day in the input array. */
  startIdx: number;
  endIdx: number;
  start: string;
  end: string;
}

/** Splits consecutive days into Monday-start weeks; the last chunk may be partial. */
export function weekChunks(days: readonly string[]): WeekChunk[] {
  const chunks: WeekChunk[] = [];
  let startIdx = 0;
  days.forEach((day, idx) => {
    if (isoWeekday(day) === 7 || idx === days.length - 1) {
      chunks.push({ startIdx, endIdx: idx, start: days[startIdx] ?? day, end: day });
      startIdx = idx + 1;
    }
  });
  return chunks;
}

/** Calendar months overlapping [from, to], clipped to the range. */
export function monthWindows(from: string, to: string): DateWindow[] {
  const windows: DateWindow[] = [];
  for (let month = monthStart(from); month <= to; month = shiftMonth(month, 1)) {
    const end = monthEnd(month);
    windows.push({ from: month < from ? from : month, to: end > to ? to : end });
  }
  return windows;
}

function presentValues(values: readonly (number | null | undefined)[]): number[] {
  return values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
}

export function sumValues(values: readonly (number | null | undefined)[]): number | null {
  const present = presentValues(values);
  return present.length === 0 ? null : present.reduce((acc, v) => acc + v, 0);
}

export function averageValues(values: readonly (number | null | undefined)[]): number | null {
  const present = presentValues(values);
  return present.length === 0 ? null : present.reduce((acc, v) => acc + v, 0) / present.length;
}

/** Sum or mean by metric kind. No present value gives null, never 0. */
export function aggregateValues(code: string, values: readonly (number | null | undefined)[]): number | null {
  return isRateMetric(code) ? averageValues(values) : sumValues(values);
}

export function seriesValues(series: MetricSeries | undefined, days: readonly string[]): (number | null)[] {
  return days.map((day) => series?.get(day) ?? null);
}

export function aggregateWindows(
  code: string,
  series: MetricSeries | undefined,
  windows: readonly DateWindow[],
): (number | null)[] {
  return windows.map((w) => aggregateValues(code, seriesValues(series, eachDay(w.from, w.to))));
}

/** One aggregate per code over [from, to]. */
export function periodValues(
  values: SeriesByMetric,
  codes: readonly string[],
  window: DateWindow,
): MetricValues {
  const days = eachDay(window.from, window.to);
  const out: Record<string, number | null> = {};
  for (const code of codes) {
    out[code] = aggregateValues(code, seriesValues(values.get(code), days));
  }
  return out;
}

/** `count` Monday-start weeks, the last one containing `endDate`. */
export function trailingWeeks(endDate: string, count: number): DateWindow[] {
  const lastStart = startOfIsoWeek(endDate);
  const weeks: DateWindow[] = [];
  for (let offset = count - 1; offset >= 0; offset--) {
    const from = addDays(lastStart, -7 * offset);
    weeks.push({ from, to: addDays(from, 6) });
  }
  return weeks;
}
