import { getOrLoad, silentLogger } from '@hourwise/core';
import type { Cache, Logger } from '@hourwise/core';
import { errorMessage } from '@hourwise/shared';
import type { SchedulingSource, StaffMember } from '../upstream/scheduling-client';
import type { BranchGroups, GroupDefinition, ResolvedGroupConfig } from '../types';
import type { GroupConfig } from '../validation';

/** Case-insensitive, ё-insensitive name key with collapsed whitespace. */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/ё/g, 'е').replace(/\s+/g, ' ');
}

function deepFreeze(config: ResolvedGroupConfig): ResolvedGroupConfig {
  for (const branch of config.branches) {
    for (const group of branch.groups) {
      Object.freeze(group.staffIds);
      Object.freeze(group);
    }
    Object.freeze(branch.groups);
    Object.freeze(branch);
  }
  Object.freeze(config.branches);
  return Object.freeze(config);
}

function indexStaff(staff: readonly StaffMember[]): Map<string, number[]> {
  const byName = new Map<string, number[]>();
  for (const member of staff) {
    if (!member.name) continue;
    const key = normalizeName(member.name);
    const ids = byName.get(key);
    if (ids) ids.push(member.id);
    else byName.set(key, [member.id]);
  }
  return byName;
}

async function loadCompanyNames(source: SchedulingSource, log: Logger): Promise<Map<number, string>> {
  const names = new Map<number, string>();
  try {
    for (const company of await source.getCompanies()) {
      if (company.title) names.set(company.id, company.title);
    }
  } catch (err) {
    log.warn('Failed to load company names', { error: { message: errorMessage(err) } });
  }
  return names;
}

/**
 * Turns configured staff names into upstream staff ids, branch by branch.
 * Groups that list no names keep their configured ids. The result is frozen:
 * one run sees one membership.
 */
export async function resolveGroupConfig(
  config: GroupConfig,
  source: SchedulingSource,
  log: Logger = silentLogger,
): Promise<ResolvedGroupConfig> {
  const companyNames = await loadCompanyNames(source, log);
  const branches: BranchGroups[] = [];

  for (const branch of config.branches) {
    const branchId = branch.branch_id;
    const configured = branch.display_name ?? '';
    const displayName =
      !configured || configured === String(branchId) ? (companyNames.get(branchId) ?? String(branchId)) : configured;

    const needsStaff = branch.groups.some((g) => g.staff_names.length > 0);
    const byName = needsStaff ? indexStaff(await source.getStaff(branchId)) : new Map<string, number[]>();

    const groups: GroupDefinition[] = branch.groups.map((group) => {
      if (group.staff_names.length === 0) {
        return { groupId: group.group_id, name: group.name, staffIds: [...new Set(group.staff_ids)].sort((a, b) => a - b) };
      }
      const ids = new Set<number>();
      for (const staffName of group.staff_names) {
        const matches = byName.get(normalizeName(staffName)) ?? [];
        const first = matches[0];
        if (first === undefined) {
          log.warn('No staff matched name', { branchId, staffName, groupId: group.group_id });
          continue;
        }
        if (matches.length > 1) {
          log.warn('Multiple staff matched name', { branchId, staffName, matches });
        }
        ids.add(first);
      }
      return { groupId: group.group_id, name: group.name, staffIds: [...ids].sort((a, b) => a - b) };
    });

    branches.push({ branchId, displayName, groups });
  }

  return deepFreeze({ branches });
}

export function findBranchGroups(config: ResolvedGroupConfig, branchId: number): BranchGroups | undefined {
  return config.branches.find((b) => b.branchId === branchId);
}

/** Group ids of a branch whose display name matches one of `names`. */
export function groupIdsByName(config: ResolvedGroupConfig, branchId: number, names: readonly string[]): string[] {
  const wanted = new Set(names.map(normalizeName));
  return (findBranchGroups(config, branchId)?.groups ?? [])
    .filter((g) => wanted.has(normalizeName(g.name)))
    .map((g) => g.groupId);
}

export interface GroupResolverOptions {
  loadConfig: () => Promise<GroupConfig>;
  source: SchedulingSource;
  cache: Cache<ResolvedGroupConfig>;
  logger?: Logger;
}

/** Resolved group membership, cached for the cache's TTL. */
export class GroupResolver {
  private static readonly CACHE_KEY = 'resolved-groups';

  constructor(private readonly options: GroupResolverOptions) {}

  resolve(): Promise<ResolvedGroupConfig> {
    return getOrLoad(this.options.cache, GroupResolver.CACHE_KEY, async () => {
      const config = await this.options.loadConfig();
      return resolveGroupConfig(config, this.options.source, this.options.logger);
    });
  }

  invalidate(): void {
    this.options.cache.delete(GroupResolver.CACHE_KEY);
  }
}
