import { toBusinessDate } from '@hourwise/shared';
import type { Logger } from '@hourwise/core';
import { silentLogger } from '@hourwise/core';
import type { MetricCatalog } from './catalog';
import { defaultCatalog } from './catalog';
import { isIgnoredBranchCode, normalizeBranchCode } from './branch-codes';
import type { FinancialRepository } from './repositories/types';
import type { Branch, DateWindow, LoadSource, MetricSeries, SeriesByMetric } from './types';

export const LOAD_METRIC = 'load_percent';

export interface FinancialContext {
  financial: FinancialRepository;
  /** Business timezone; decides the current month and year. */
  timezone: string;
  catalog?: MetricCatalog;
  /** Replaces stored `load_percent` figures when it returns any day. */
  loadSource?: LoadSource;
  /** Display names that override the `branches` table. */
  branchNames?: ReadonlyMap<string, string>;
  now?: () => Date;
  logger?: Logger;
}

export function catalogOf(ctx: FinancialContext): MetricCatalog {
  return ctx.catalog ?? defaultCatalog;
}

export function currentBusinessDate(ctx: FinancialContext): string {
  return toBusinessDate(ctx.now?.() ?? new Date(), ctx.timezone);
}

export function canonicalBranchCode(code: string): string {
  return normalizeBranchCode(code) ?? code.trim();
}

/**
 * Daily series for the codes in [from, to]. Codes without rows map to an
 * empty series; without `codes`, every stored code is returned.
 */
export async function fetchSeries(
  ctx: FinancialContext,
  branchCode: string,
  window: DateWindow,
  codes?: readonly string[],
): Promise<SeriesByMetric> {
  const facts = await ctx.financial.listDailyFacts(branchCode, window, codes);
  const series = new Map<string, Map<string, number>>((codes ?? []).map((code) => [code, new Map()]));
  for (const fact of facts) {
    let byDate = series.get(fact.metricCode);
    if (!byDate) {
      byDate = new Map();
      series.set(fact.metricCode, byDate);
    }
    byDate.set(fact.date, fact.value);
  }

  const out = new Map<string, MetricSeries>(series);
  if (ctx.loadSource && (codes === undefined || codes.includes(LOAD_METRIC))) {
    const load = await ctx.loadSource(branchCode, window.from, window.to);
    if (load.size > 0) {
      out.set(LOAD_METRIC, load);
    } else {
      (ctx.logger ?? silentLogger).debug('No occupancy load for branch, keeping stored figures', {
        branchCode,
        from: window.from,
        to: window.to,
      });
    }
  }
  return out;
}

/** Branch for display; null for roll-up codes that are not a branch. */
export async function resolveBranch(ctx: FinancialContext, code: string): Promise<Branch | null> {
  if (isIgnoredBranchCode(code)) return null;
  const row = await ctx.financial.getBranch(code);
  const name = ctx.branchNames?.get(code) ?? row?.name ?? code;
  return { code, name };
}
