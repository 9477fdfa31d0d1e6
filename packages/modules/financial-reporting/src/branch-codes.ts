import { defaultBranchCodeRules } from './catalog';
import type { BranchCodeRules } from './catalog';

/**
 * Canonical branch code: trimmed, upper-cased, alias-mapped, with Latin
 * look-alike letters swapped for their Cyrillic twins. Empty input gives null.
 */
export function normalizeBranchCode(
  code: string | null | undefined,
  rules: BranchCodeRules = defaultBranchCodeRules,
): string | null {
  if (code === null || code === undefined) return null;
  const raw = code.trim().toUpperCase();
  if (raw.length === 0) return null;
  const alias = rules.aliases.get(raw);
  if (alias !== undefined) return alias;
  return Array.from(raw, (ch) => rules.latinToCyrillic.get(ch) ?? ch).join('');
}

/** Roll-up rows (sheet totals) that are never a branch of their own. */
export function isIgnoredBranchCode(code: string, rules: BranchCodeRules = defaultBranchCodeRules): boolean {
  const normalized = normalizeBranchCode(code, rules);
  if (normalized === null) return false;
  for (const ignored of rules.ignored) {
    if (normalizeBranchCode(ignored, rules) === normalized) return true;
  }
  return false;
}
