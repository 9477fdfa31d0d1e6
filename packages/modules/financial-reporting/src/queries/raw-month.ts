import { z } from 'zod';
import { formatMonth, isoWeekday, monthDays, monthSchema, parseInput, parseMonth } from '@hourwise/shared';
import { aggregateValues, isRateMetric, seriesValues, weekChunks } from '../periods';
import type { WeekChunk } from '../periods';
import type { Branch } from '../types';
import type { FinancialContext } from '../context';
import { canonicalBranchCode, catalogOf, fetchSeries, resolveBranch } from '../context';
import type { MonthReportDay } from './month-report';

export const rawMonthInputSchema = z.object({
  branchCode: z.string().trim().min(1),
  month: monthSchema,
});

export type RawMonthInput = z.input<typeof rawMonthInputSchema>;

export interface RawMonthMetric {
  code: string;
  label: string;
  /** False for codes stored in the facts but missing from the catalog. */
  inCatalog: boolean;
  /** Averaged rather than summed over weeks and the month. */
  rate: boolean;
  values: (number | null)[];
  weekTotals: (number | null)[];
  monthTotal: number | null;
}

export interface RawMonth {
  branch: Branch | null;
  month: string;
  days: MonthReportDay[];
  weeks: WeekChunk[];
  metrics: RawMonthMetric[];
}

/**
 * Stored figures as they are: every base catalog code in catalog order, then
 * any other code the branch has in the month, sorted. No derived rows.
 */
export async function buildRawMonth(ctx: FinancialContext, input: RawMonthInput): Promise<RawMonth> {
  const parsed = parseInput(rawMonthInputSchema, input, 'Invalid raw month request');
  const catalog = catalogOf(ctx);
  const branchCode = canonicalBranchCode(parsed.branchCode);
  const start = parseMonth(parsed.month);
  const days = monthDays(start);
  const weeks = weekChunks(days);

  const series = await fetchSeries(ctx, branchCode, { from: start, to: days[days.length - 1] ?? start });
  const known = new Set(catalog.baseCodes);
  const extra = [...series.keys()].filter((code) => !known.has(code)).sort();

  const metrics = [...catalog.baseCodes, ...extra].map((code): RawMonthMetric => {
    const values = seriesValues(series.get(code), days);
    return {
      code,
      label: catalog.labelOf(code),
      inCatalog: known.has(code),
      rate: isRateMetric(code),
      values,
      weekTotals: weeks.map((w) => aggregateValues(code, values.slice(w.startIdx, w.endIdx + 1))),
      monthTotal: aggregateValues(code, values),
    };
  });

  return {
    branch: await resolveBranch(ctx, branchCode),
    month: formatMonth(start),
    days: days.map((date) => ({ date, day: Number(date.slice(8, 10)), dow: isoWeekday(date) })),
    weeks,
    metrics,
  };
}
