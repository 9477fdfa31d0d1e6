import {
  addDays,
  eachDay,
  formatMonth,
  monthEnd,
  monthSchema,
  parseInput,
  parseMonth,
  shiftMonth,
} from '@hourwise/shared';
import { z } from 'zod';
import {
  computeDelta,
  detectLoadRevenueMismatch,
  detectWriteoffSpike,
  rankTopDrivers,
  reconcileCash,
} from '../comparison';
import type { CashDiscrepancy, CheckStatus, Delta, Driver, LoadRevenueCheck } from '../comparison';
import { withDerivedMetrics } from '../derived';
import { averageValues, periodValues, trailingWeeks } from '../periods';
import type { Branch, DateWindow, MetricValues } from '../types';
import type { FinancialContext } from '../context';
import { LOAD_METRIC, canonicalBranchCode, catalogOf, fetchSeries, resolveBranch } from '../context';

export const TRAILING_WEEKS = 8;
export const MAX_ALERTS = 3;

const YOY_DELTA_CODES = [
  'revenue_total',
  'coworking_total',
  'coffee_revenue_total',
  LOAD_METRIC,
  'written_off_food_total',
] as const;

export const overviewInputSchema = z.object({
  branchCode: z.string().trim().min(1),
  month: monthSchema,
});

export type OverviewInput = z.input<typeof overviewInputSchema>;

export type OverviewAlert =
  | { type: 'cash'; count: number; maxDiff: number }
  | { type: 'writeoff'; rate: number }
  | { type: 'load_open' | 'load_coffee'; load: number; loadAvg: number; value: number; avg: number };

export type OverviewCheck =
  | { key: 'cash'; status: CheckStatus; count: number; maxDiff: number | null }
  | ({ key: 'load_open' | 'load_coffee' } & LoadRevenueCheck);

export interface Overview {
  branch: Branch | null;
  month: string;
  mtd: {
    /** Last day of the month with any non-load figure; 0 when none. */
    cutoffDay: number;
    daysInMonth: number;
    filledDays: number;
    current: MetricValues;
    /** Same day span one year earlier. */
    yoy: MetricValues;
  };
  yoyDelta: Record<(typeof YOY_DELTA_CODES)[number], Delta>;
  coefficients: {
    avgCheck: number | null;
    writeoffRate: number | null;
    labToOpenSpaceRatio: number | null;
  };
  drivers: Driver[];
  alerts: OverviewAlert[];
  checks: OverviewCheck[];
  cashControl: CashDiscrepancy[];
  weekly: { weeks: DateWindow[]; values: Record<string, (number | null)[]> };
  averages: {
    load_percent: number | null;
    revenue_open_space: number | null;
    coffee_revenue_total: number | null;
  };
}

function maxAbsDiff(items: readonly CashDiscrepancy[]): number {
  return items.reduce((max, item) => Math.max(max, Math.abs(item.diff)), 0);
}

function loadAlert(type: 'load_open' | 'load_coffee', check: LoadRevenueCheck): OverviewAlert | null {
  const { status, load, loadAvg, value, avg } = check;
  if (status !== 'alert' || load === null || loadAvg === null || value === null || avg === null) return null;
  return { type, load, loadAvg, value, avg };
}

/**
 * Month-to-date dashboard: totals up to the last filled day, the same span a
 * year earlier, trailing weekly series and the anomaly checks built on them.
 */
export async function buildOverview(ctx: FinancialContext, input: OverviewInput): Promise<Overview> {
  const parsed = parseInput(overviewInputSchema, input, 'Invalid overview request');
  const catalog = catalogOf(ctx);
  const branchCode = canonicalBranchCode(parsed.branchCode);
  const start = parseMonth(parsed.month);
  const end = monthEnd(start);
  const yoyStart = shiftMonth(start, -12);

  const trailingFrom = addDays(start, -7 * TRAILING_WEEKS);
  const series = await fetchSeries(
    ctx,
    branchCode,
    { from: trailingFrom < yoyStart ? trailingFrom : yoyStart, to: end },
    catalog.baseCodes,
  );

  const monthDates = eachDay(start, end);
  const cutoffCodes = catalog.baseCodes.filter((code) => code !== LOAD_METRIC);
  const filled = monthDates.filter((day) => cutoffCodes.some((code) => series.get(code)?.has(day)));
  const cutoffDate = filled[filled.length - 1];
  const cutoffDay = cutoffDate ? Number(cutoffDate.slice(8, 10)) : 0;

  let current: MetricValues = {};
  let yoy: MetricValues = {};
  if (cutoffDate) {
    current = withDerivedMetrics(periodValues(series, catalog.baseCodes, { from: start, to: cutoffDate }), catalog);
    yoy = withDerivedMetrics(
      periodValues(series, catalog.baseCodes, { from: yoyStart, to: addDays(yoyStart, cutoffDay - 1) }),
      catalog,
    );
  }
  const deltaFor = (code: string): Delta => computeDelta(current[code], yoy[code]);

  const weeks = trailingWeeks(cutoffDate ?? end, TRAILING_WEEKS);
  const weeklyValues: Record<string, (number | null)[]> = {};
  for (const code of catalog.baseCodes) weeklyValues[code] = [];
  for (const week of weeks) {
    const values = periodValues(series, catalog.baseCodes, week);
    for (const code of catalog.baseCodes) weeklyValues[code]?.push(values[code] ?? null);
  }
  const averages = {
    load_percent: averageValues(weeklyValues[LOAD_METRIC] ?? []),
    revenue_open_space: averageValues(weeklyValues.revenue_open_space ?? []),
    coffee_revenue_total: averageValues(weeklyValues.coffee_revenue_total ?? []),
  };

  const cashControl = cutoffDate
    ? reconcileCash(monthDates.slice(0, cutoffDay), {
        balance: series.get('cash_balance_end_day'),
        cashRevenue: series.get('revenue_cash'),
        deposits: series.get('deposit_total'),
        withdrawals: series.get('withdrawals_total'),
      })
    : [];

  const loadOpen = detectLoadRevenueMismatch({
    load: current[LOAD_METRIC],
    loadAvg: averages.load_percent,
    value: current.revenue_open_space,
    avg: averages.revenue_open_space,
  });
  const loadCoffee = detectLoadRevenueMismatch({
    load: current[LOAD_METRIC],
    loadAvg: averages.load_percent,
    value: current.coffee_revenue_total,
    avg: averages.coffee_revenue_total,
  });

  const alerts: OverviewAlert[] = [];
  if (cashControl.length > 0) {
    alerts.push({ type: 'cash', count: cashControl.length, maxDiff: maxAbsDiff(cashControl) });
  }
  const writeoffRate = current.writeoff_rate_full ?? null;
  if (writeoffRate !== null && detectWriteoffSpike(writeoffRate)) {
    alerts.push({ type: 'writeoff', rate: writeoffRate });
  }
  for (const alert of [loadAlert('load_open', loadOpen), loadAlert('load_coffee', loadCoffee)]) {
    if (alert) alerts.push(alert);
  }

  const cashCheck: OverviewCheck =
    cashControl.length > 0
      ? { key: 'cash', status: 'alert', count: cashControl.length, maxDiff: maxAbsDiff(cashControl) }
      : { key: 'cash', status: cutoffDay ? 'ok' : 'no_data', count: 0, maxDiff: null };

  return {
    branch: await resolveBranch(ctx, branchCode),
    month: formatMonth(start),
    mtd: { cutoffDay, daysInMonth: monthDates.length, filledDays: filled.length, current, yoy },
    yoyDelta: {
      revenue_total: deltaFor('revenue_total'),
      coworking_total: deltaFor('coworking_total'),
      coffee_revenue_total: deltaFor('coffee_revenue_total'),
      load_percent: deltaFor(LOAD_METRIC),
      written_off_food_total: deltaFor('written_off_food_total'),
    },
    coefficients: {
      avgCheck: current.avg_check ?? null,
      writeoffRate,
      labToOpenSpaceRatio: current.lab_to_open_space_ratio ?? null,
    },
    drivers: rankTopDrivers(current, yoy, catalog.drivers),
    alerts: alerts.slice(0, MAX_ALERTS),
    checks: [cashCheck, { key: 'load_open', ...loadOpen }, { key: 'load_coffee', ...loadCoffee }],
    cashControl,
    weekly: { weeks, values: weeklyValues },
    averages,
  };
}
