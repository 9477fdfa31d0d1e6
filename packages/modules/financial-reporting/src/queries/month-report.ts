import { z } from 'zod';
import {
  eachDay,
  formatMonth,
  isoWeekday,
  monthDays,
  monthSchema,
  parseInput,
  parseMonth,
  shiftMonth,
} from '@hourwise/shared';
import type { MetricCatalog, MonthReportRow } from '../catalog';
import { withDerivedMetrics } from '../derived';
import { aggregateValues, isRateMetric, periodValues, seriesValues, weekChunks } from '../periods';
import type { Branch, DateWindow, SeriesByMetric } from '../types';
import type { FinancialContext } from '../context';
import { canonicalBranchCode, catalogOf, fetchSeries, resolveBranch } from '../context';

export const monthReportInputSchema = z.object({
  branchCode: z.string().trim().min(1),
  month: monthSchema,
});

export type MonthReportInput = z.input<typeof monthReportInputSchema>;

export type MonthReportColumn =
  | { kind: 'previous_week'; offset: number; window: DateWindow }
  | { kind: 'previous_month'; window: DateWindow }
  | { kind: 'week'; offset: number; window: DateWindow };

export interface MonthReportDay {
  date: string;
  day: number;
  /** ISO weekday, Monday = 1. */
  dow: number;
}

export interface MonthReportMetric {
  key: string;
  code: string;
  label: string;
  unit: string;
  group: string;
  planEnabled: boolean;
  values: (number | null)[];
  /** One value per column, in column order. */
  columns: (number | null)[];
  monthTotal: number | null;
  plan: number | null;
  planPct: number | null;
  planDelta: number | null;
  forecast: number | null;
  forecastPct: number | null;
}

export interface MonthReport {
  branch: Branch | null;
  month: string;
  days: MonthReportDay[];
  columns: MonthReportColumn[];
  groups: Readonly<Record<string, string>>;
  metrics: MonthReportMetric[];
}

type WindowValue = (window: DateWindow) => number | null;

/** Aggregates stored metrics directly; derived ones are recomputed from aggregated inputs. */
function windowValueFor(row: MonthReportRow, series: SeriesByMetric, catalog: MetricCatalog): WindowValue {
  const { code, derived } = row.metric;
  if (derived) {
    return (window) => withDerivedMetrics(periodValues(series, catalog.baseCodes, window), catalog)[code] ?? null;
  }
  return (window) => aggregateValues(code, seriesValues(series.get(code), eachDay(window.from, window.to)));
}

function pct(value: number | null, of: number | null): number | null {
  if (value === null || of === null || of === 0) return null;
  return (value / of) * 100;
}

/**
 * Day-by-day grid for one month with the previous month alongside: its
 * Monday-start weeks, its total, then this month's weeks. Plan figures and
 * a run-rate forecast apply to plan-enabled metrics.
 */
export async function buildMonthReport(ctx: FinancialContext, input: MonthReportInput): Promise<MonthReport> {
  const parsed = parseInput(monthReportInputSchema, input, 'Invalid month report request');
  const catalog = catalogOf(ctx);
  const branchCode = canonicalBranchCode(parsed.branchCode);
  const start = parseMonth(parsed.month);
  const prevDays = monthDays(shiftMonth(start, -1));
  const currDays = monthDays(start);

  const prevWeeks = weekChunks(prevDays).map((c) => ({ from: c.start, to: c.end }));
  const currWeeks = weekChunks(currDays).map((c) => ({ from: c.start, to: c.end }));
  const prevMonth: DateWindow = { from: prevDays[0] ?? start, to: prevDays[prevDays.length - 1] ?? start };
  const columns: MonthReportColumn[] = [
    ...prevWeeks.map((window, i) => ({ kind: 'previous_week' as const, offset: i - prevWeeks.length, window })),
    { kind: 'previous_month', window: prevMonth },
    ...currWeeks.map((window, i) => ({ kind: 'week' as const, offset: i + 1, window })),
  ];

  const month: DateWindow = { from: start, to: currDays[currDays.length - 1] ?? start };
  const series = await fetchSeries(ctx, branchCode, { from: prevMonth.from, to: month.to }, catalog.baseCodes);
  const planCodes = [...new Set(catalog.monthReport.filter((r) => r.metric.plan).map((r) => r.metric.code))];
  const plans = new Map(
    (await ctx.financial.listPlans(branchCode, planCodes, start)).map((p) => [p.metricCode, p.value]),
  );

  const metrics = catalog.monthReport.map((row): MonthReportMetric => {
    const valueOf = windowValueFor(row, series, catalog);
    const values = currDays.map((day) => valueOf({ from: day, to: day }));
    const monthTotal = valueOf(month);
    const filledDays = values.filter((v) => v !== null).length;

    let forecast: number | null = null;
    if (filledDays > 0 && monthTotal !== null) {
      forecast =
        row.metric.derived || isRateMetric(row.metric.code) ? monthTotal : (monthTotal / filledDays) * currDays.length;
    }
    const plan = row.metric.plan ? plans.get(row.metric.code) ?? null : null;

    return {
      key: row.key,
      code: row.metric.code,
      label: row.label,
      unit: row.metric.unit,
      group: row.group,
      planEnabled: row.metric.plan,
      values,
      columns: columns.map((c) => valueOf(c.window)),
      monthTotal,
      plan,
      planPct: pct(monthTotal, plan),
      planDelta: plan !== null && monthTotal !== null ? monthTotal - plan : null,
      forecast,
      forecastPct: pct(forecast, plan),
    };
  });

  return {
    branch: await resolveBranch(ctx, branchCode),
    month: formatMonth(start),
    days: currDays.map((date) => ({ date, day: Number(date.slice(8, 10)), dow: isoWeekday(date) })),
    columns,
    groups: catalog.groups,
    metrics,
  };
}
