import { z } from 'zod';
import { parseInput } from '@hourwise/shared';
import type { Branch } from '../types';
import type { FinancialContext } from '../context';
import { canonicalBranchCode, catalogOf, currentBusinessDate, resolveBranch } from '../context';

export const yearSummaryInputSchema = z.object({ branchCode: z.string().trim().min(1) });

export type YearSummaryInput = z.input<typeof yearSummaryInputSchema>;

export interface YearSummaryMetric {
  code: string;
  label: string;
  /** Monthly fact totals keyed by `YYYY-MM`; months without data are absent. */
  fact: Record<string, number>;
  plan: Record<string, number>;
}

export interface YearSummary {
  branch: Branch | null;
  years: number[];
  /** Every month of every year in `years`, ascending. */
  months: string[];
  groups: ReadonlyArray<{ label: string; metrics: readonly string[] }>;
  metrics: YearSummaryMetric[];
  /** Year that plans are entered for. */
  planYear: number;
}

/** From the earliest year with data, or the current one, through the latest or current one. */
export function yearRange(months: readonly string[], currentYear: number): number[] {
  const years = months.map((m) => Number(m.slice(0, 4)));
  const first = Math.min(currentYear, ...years);
  const last = Math.max(currentYear, ...years);
  const out: number[] = [];
  for (let year = first; year <= last; year++) out.push(year);
  return out;
}

export async function buildYearSummary(ctx: FinancialContext, input: YearSummaryInput): Promise<YearSummary> {
  const parsed = parseInput(yearSummaryInputSchema, input, 'Invalid year summary request');
  const catalog = catalogOf(ctx);
  const branchCode = canonicalBranchCode(parsed.branchCode);
  const codes = catalog.yearMetrics;

  const [totals, plans] = await Promise.all([
    ctx.financial.monthlyFactTotals(branchCode, codes),
    ctx.financial.listPlans(branchCode, codes),
  ]);

  const facts = new Map<string, Record<string, number>>(codes.map((code) => [code, {}]));
  const planned = new Map<string, Record<string, number>>(codes.map((code) => [code, {}]));
  const seen = new Set<string>();
  for (const t of totals) {
    const byMonth = facts.get(t.metricCode);
    if (byMonth) byMonth[t.month] = t.value;
    seen.add(t.month);
  }
  for (const p of plans) {
    const month = p.monthStart.slice(0, 7);
    const byMonth = planned.get(p.metricCode);
    if (byMonth) byMonth[month] = p.value;
    seen.add(month);
  }

  const currentYear = Number(currentBusinessDate(ctx).slice(0, 4));
  const years = yearRange([...seen], currentYear);

  return {
    branch: await resolveBranch(ctx, branchCode),
    years,
    months: years.flatMap((year) =>
      Array.from({ length: 12 }, (_, i) => `${year}-${String(i + 1).padStart(2, '0')}`),
    ),
    groups: catalog.yearGroups,
    metrics: codes.map((code) => ({
      code,
      label: catalog.labelOf(code),
      fact: facts.get(code) ?? {},
      plan: planned.get(code) ?? {},
    })),
    planYear: currentYear,
  };
}
