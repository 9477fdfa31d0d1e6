import { z } from 'zod';
import { monthSchema, parseInput, parseMonth } from '@hourwise/shared';
import { silentLogger } from '@hourwise/core';
import { isIgnoredBranchCode } from '../branch-codes';
import { canonicalBranchCode } from '../context';
import type { FinancialContext } from '../context';
import type { MonthlyPlan } from '../types';

export const upsertPlanSchema = z.object({
  branchCode: z.string().trim().min(1),
  month: monthSchema,
  metricCode: z.string().trim().min(1),
  value: z.coerce.number().finite(),
});

export type UpsertPlanInput = z.input<typeof upsertPlanSchema>;

/**
 * Sets the plan figure for one (branch, metric, month), replacing any earlier
 * one. Roll-up codes are not branches: nothing is stored and null comes back.
 */
export async function upsertPlan(ctx: FinancialContext, input: UpsertPlanInput): Promise<MonthlyPlan | null> {
  const parsed = parseInput(upsertPlanSchema, input, 'Invalid plan');
  const branchCode = canonicalBranchCode(parsed.branchCode);
  if (isIgnoredBranchCode(branchCode)) {
    (ctx.logger ?? silentLogger).info('Plan for roll-up code skipped', { branchCode, metricCode: parsed.metricCode });
    return null;
  }
  const plan: MonthlyPlan = {
    branchCode,
    metricCode: parsed.metricCode,
    monthStart: parseMonth(parsed.month),
    value: parsed.value,
  };
  await ctx.financial.upsertPlan(plan);
  return plan;
}
