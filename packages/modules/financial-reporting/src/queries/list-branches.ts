import { isIgnoredBranchCode } from '../branch-codes';
import type { FinancialContext } from '../context';
import type { Branch } from '../types';

/**
 * Registered branches plus any code that only appears in the daily facts,
 * sorted by display name. Roll-up codes are left out.
 */
export async function listBranches(ctx: FinancialContext): Promise<Branch[]> {
  const [registered, factCodes] = await Promise.all([
    ctx.financial.listBranches(),
    ctx.financial.listFactBranchCodes(),
  ]);
  const byCode = new Map<string, Branch>();
  for (const row of registered) {
    byCode.set(row.code, { code: row.code, name: ctx.branchNames?.get(row.code) ?? row.name });
  }
  for (const code of factCodes) {
    if (!byCode.has(code)) byCode.set(code, { code, name: ctx.branchNames?.get(code) ?? code });
  }
  return [...byCode.values()]
    .filter((b) => !isIgnoredBranchCode(b.code) && !isIgnoredBranchCode(b.name))
    .sort((a, b) => a.name.localeCompare(b.name) || a.code.localeCompare(b.code));
}
