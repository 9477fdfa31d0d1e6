import { z } from 'zod';
import { parseInput } from '@hourwise/shared';
import { canonicalBranchCode, currentBusinessDate } from '../context';
import type { FinancialContext } from '../context';

export const listMonthsInputSchema = z.object({ branchCode: z.string().trim().min(1) });

export type ListMonthsInput = z.input<typeof listMonthsInputSchema>;

/** `YYYY-MM` months with data up to the current one, newest first. */
export async function listMonths(ctx: FinancialContext, input: ListMonthsInput): Promise<string[]> {
  const { branchCode } = parseInput(listMonthsInputSchema, input, 'Invalid month list request');
  const current = currentBusinessDate(ctx).slice(0, 7);
  const months = await ctx.financial.listFactMonths(canonicalBranchCode(branchCode));
  return months.filter((m) => m <= current);
}
