import { z } from 'zod';
import { parseInput } from '@hourwise/shared';
import { isIgnoredBranchCode, normalizeBranchCode } from '../branch-codes';
import type { FinancialContext } from '../context';
import type { Branch } from '../types';

export const upsertBranchesSchema = z.object({
  branches: z.array(
    z.object({
      code: z.string().trim().min(1),
      name: z.string().trim().min(1).optional(),
    }),
  ),
});

export type UpsertBranchesInput = z.input<typeof upsertBranchesSchema>;

/** Registers branches under their canonical codes. Roll-up codes are dropped. */
export async function upsertBranches(ctx: FinancialContext, input: UpsertBranchesInput): Promise<Branch[]> {
  const parsed = parseInput(upsertBranchesSchema, input, 'Invalid branches');
  const byCode = new Map<string, Branch>();
  for (const item of parsed.branches) {
    const code = normalizeBranchCode(item.code) ?? item.code;
    if (isIgnoredBranchCode(code)) continue;
    byCode.set(code, { code, name: item.name ?? code });
  }
  const rows = [...byCode.values()];
  await ctx.financial.upsertBranches(rows);
  return rows;
}
