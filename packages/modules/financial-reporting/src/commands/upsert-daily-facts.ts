import { z } from 'zod';
import { isoDateSchema, parseInput } from '@hourwise/shared';
import { silentLogger } from '@hourwise/core';
import { isIgnoredBranchCode, normalizeBranchCode } from '../branch-codes';
import type { FinancialContext } from '../context';
import type { DailyMetricFact } from '../types';

const factSchema = z.object({
  branchCode: z.string().trim().min(1),
  metricCode: z.string().trim().min(1),
  date: isoDateSchema,
  value: z.number().finite(),
  source: z.string().trim().min(1).default('manual'),
});

export const upsertDailyFactsSchema = z.object({ facts: z.array(factSchema) });

export type UpsertDailyFactsInput = z.input<typeof upsertDailyFactsSchema>;

export interface UpsertDailyFactsResult {
  written: number;
  /** Rows for roll-up codes that are not a branch. */
  skipped: number;
}

/**
 * Stores daily figures keyed by (branch, metric, date). Branch codes are
 * normalized first; a later row for the same key in one batch wins.
 */
export async function upsertDailyFacts(
  ctx: FinancialContext,
  input: UpsertDailyFactsInput,
): Promise<UpsertDailyFactsResult> {
  const { facts } = parseInput(upsertDailyFactsSchema, input, 'Invalid daily facts');
  const byKey = new Map<string, DailyMetricFact>();
  let skipped = 0;
  for (const fact of facts) {
    const branchCode = normalizeBranchCode(fact.branchCode) ?? fact.branchCode;
    if (isIgnoredBranchCode(branchCode)) {
      skipped++;
      continue;
    }
    byKey.set(`${branchCode}|${fact.metricCode}|${fact.date}`, { ...fact, branchCode });
  }

  const written = await ctx.financial.upsertDailyFacts([...byKey.values()]);
  (ctx.logger ?? silentLogger).info('Daily facts upserted', { written, skipped });
  return { written, skipped };
}
