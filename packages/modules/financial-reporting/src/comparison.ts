import type { DriverSource } from './catalog';
import type { MetricSeries, MetricValues } from './types';

export const CASH_DISCREPANCY_THRESHOLD = 1000;
export const WRITEOFF_ALERT_RATE = 0.1;
/** Revenue at or below this share of its trailing average counts as weak. */
export const WEAK_REVENUE_SHARE = 0.9;
export const TOP_DRIVER_LIMIT = 3;

type Maybe = number | null | undefined;

export interface Delta {
  delta: number | null;
  /** Percent change against `previous`; null when previous is 0. */
  pct: number | null;
}

export function computeDelta(current: Maybe, previous: Maybe): Delta {
  if (current === null || current === undefined || previous === null || previous === undefined) {
    return { delta: null, pct: null };
  }
  const delta = current - previous;
  return { delta, pct: previous !== 0 ? (delta / previous) * 100 : null };
}

export interface CashSeries {
  balance: MetricSeries | undefined;
  cashRevenue: MetricSeries | undefined;
  deposits: MetricSeries | undefined;
  withdrawals: MetricSeries | undefined;
}

export interface CashDiscrepancy {
  date: string;
  expected: number;
  actual: number;
  diff: number;
}

/**
 * Checks each closing balance against the previous one plus the day's cash
 * flows. Days without both balances are skipped; missing flows count as 0.
 */
export function reconcileCash(
  days: readonly string[],
  series: CashSeries,
  threshold: number = CASH_DISCREPANCY_THRESHOLD,
): CashDiscrepancy[] {
  const out: CashDiscrepancy[] = [];
  for (let i = 1; i < days.length; i++) {
    const day = days[i];
    const prevDay = days[i - 1];
    if (day === undefined || prevDay === undefined) continue;
    const actual = series.balance?.get(day);
    const previous = series.balance?.get(prevDay);
    if (actual === undefined || previous === undefined) continue;

    const expected =
      previous +
      (series.cashRevenue?.get(day) ?? 0) +
      (series.deposits?.get(day) ?? 0) -
      (series.withdrawals?.get(day) ?? 0);
    const diff = actual - expected;
    if (Math.abs(diff) >= threshold) out.push({ date: day, expected, actual, diff });
  }
  return out;
}

export type CheckStatus = 'ok' | 'alert' | 'no_data';

export interface LoadRevenueInput {
  load: Maybe;
  loadAvg: Maybe;
  value: Maybe;
  avg: Maybe;
}

export interface LoadRevenueCheck {
  status: CheckStatus;
  load: number | null;
  loadAvg: number | null;
  value: number | null;
  avg: number | null;
}

/** High load with revenue at or under 90% of its trailing average. */
export function detectLoadRevenueMismatch(input: LoadRevenueInput): LoadRevenueCheck {
  const load = input.load ?? null;
  const loadAvg = input.loadAvg ?? null;
  const value = input.value ?? null;
  const avg = input.avg ?? null;
  if (load === null || loadAvg === null || value === null || avg === null) {
    return { status: 'no_data', load, loadAvg, value, avg };
  }
  const mismatch = load >= loadAvg && value <= avg * WEAK_REVENUE_SHARE;
  return { status: mismatch ? 'alert' : 'ok', load, loadAvg, value, avg };
}

export function detectWriteoffSpike(rate: Maybe, threshold: number = WRITEOFF_ALERT_RATE): boolean {
  return rate !== null && rate !== undefined && rate > threshold;
}

export interface Driver {
  code: string;
  label: string;
  delta: number;
  pct: number;
}

/** Candidates that grew against the comparison period, largest gain first. */
export function rankTopDrivers(
  current: MetricValues,
  previous: MetricValues,
  candidates: readonly DriverSource[],
  limit: number = TOP_DRIVER_LIMIT,
): Driver[] {
  const drivers: Driver[] = [];
  for (const { code, label } of candidates) {
    const { delta, pct } = computeDelta(current[code], previous[code]);
    if (delta === null || pct === null || delta <= 0) continue;
    drivers.push({ code, label, delta, pct });
  }
  return drivers.sort((a, b) => b.delta - a.delta).slice(0, limit);
}
