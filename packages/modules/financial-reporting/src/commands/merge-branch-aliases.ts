import { silentLogger } from '@hourwise/core';
import { normalizeBranchCode } from '../branch-codes';
import type { FinancialContext } from '../context';

export interface BranchMerge {
  from: string;
  to: string;
  rows: number;
}

/**
 * Rewrites facts stored under a non-canonical branch code (an alias or a
 * Latin spelling) onto the canonical code.
 */
export async function mergeBranchAliases(ctx: FinancialContext): Promise<BranchMerge[]> {
  const log = ctx.logger ?? silentLogger;
  const merges: BranchMerge[] = [];
  for (const code of await ctx.financial.listFactBranchCodes()) {
    const canonical = normalizeBranchCode(code);
    if (canonical === null || canonical === code) continue;
    const rows = await ctx.financial.mergeBranchCode(code, canonical);
    if (rows === 0) continue;
    log.info('Merged branch alias', { branchCode: canonical, alias: code, rows });
    merges.push({ from: code, to: canonical, rows });
  }
  return merges;
}
