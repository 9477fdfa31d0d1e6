import { addDays, parseZonedDateTime, ValidationError } from '@hourwise/shared';
import type { IsoDate } from '@hourwise/shared';
import type { Logger, RebuildLock } from '@hourwise/core';
import { buildGroupHourLoads } from '../builders/group-load';
import { buildStaffHourFacts } from '../builders/hourly-occupancy';
import type { HourPolicy } from '../hour-policy';
import type { OccupancyRepository } from '../repositories/types';
import type { DateWindow, GroupDefinition, VisitInterval } from '../types';

export interface PipelineContext {
  occupancy: OccupancyRepository;
  timezone: string;
  hourPolicy: HourPolicy;
  lock: RebuildLock;
  logger: Logger;
}

export interface BranchRebuildResult {
  branchId: number;
  rawRecords: number;
  staffHourFacts: number;
  groupHourLoads: number;
}

export function rebuildLockKey(branchId: number): string {
  return `branch:${branchId}`;
}

/** Replaces the branch's busy facts inside `window` with those built from `intervals`. */
export async function rebuildStaffHourFacts(
  ctx: PipelineContext,
  branchId: number,
  window: DateWindow,
  intervals: readonly VisitInterval[],
): Promise<number> {
  const facts = buildStaffHourFacts(branchId, intervals, window, {
    timezone: ctx.timezone,
    hourPolicy: ctx.hourPolicy,
  });
  await ctx.occupancy.replaceStaffHourFacts(branchId, window, facts);
  return facts.length;
}

/** Recomputes group loads from the busy facts already stored for `window`. */
export async function rebuildGroupHourLoads(
  ctx: PipelineContext,
  branchId: number,
  window: DateWindow,
  groups: readonly GroupDefinition[],
): Promise<number> {
  const staffIds = [...new Set(groups.flatMap((g) => g.staffIds))];
  const busy = staffIds.length > 0 ? await ctx.occupancy.listBusyStaffHours(branchId, window, staffIds) : [];
  const rows = buildGroupHourLoads(branchId, busy, groups, window, ctx.hourPolicy);
  await ctx.occupancy.replaceGroupHourLoads(branchId, window, rows);
  return rows.length;
}

/**
 * Persists freshly normalized visits and rebuilds both derived tables for
 * one branch. Runs under the branch's rebuild lock so two writers never
 * interleave their delete and insert phases.
 */
export function rebuildBranch(
  ctx: PipelineContext,
  branchId: number,
  window: DateWindow,
  intervals: readonly VisitInterval[],
  groups: readonly GroupDefinition[],
): Promise<BranchRebuildResult> {
  assertWindow(window);
  return ctx.lock.run(rebuildLockKey(branchId), async () => {
    const rawRecords = await ctx.occupancy.upsertRawRecords(intervals);
    const staffHourFacts = await rebuildStaffHourFacts(ctx, branchId, window, intervals);
    const groupHourLoads = await rebuildGroupHourLoads(ctx, branchId, window, groups);
    ctx.logger.info('Branch rebuilt', {
      branchId,
      window: `${window.from}..${window.to}`,
      rawRecords,
      staffHourFacts,
      groupHourLoads,
    });
    return { branchId, rawRecords, staffHourFacts, groupHourLoads };
  });
}

/** Local midnight of `date` as an instant. */
function zonedMidnight(date: IsoDate, timezone: string): Date {
  const instant = parseZonedDateTime(date, timezone);
  if (!instant) throw new ValidationError(`Invalid date ${date}`);
  return instant;
}

/**
 * Rebuilds derived tables from visits already stored in `raw_records`,
 * without calling upstream.
 */
export function rebuildFromRawRecords(
  ctx: PipelineContext,
  branchId: number,
  window: DateWindow,
  groups: readonly GroupDefinition[],
): Promise<BranchRebuildResult> {
  assertWindow(window);
  return ctx.lock.run(rebuildLockKey(branchId), async () => {
    const from = zonedMidnight(window.from, ctx.timezone);
    const to = zonedMidnight(addDays(window.to, 1), ctx.timezone);
    const intervals = await ctx.occupancy.listRawRecords(branchId, from, to);
    const staffHourFacts = await rebuildStaffHourFacts(ctx, branchId, window, intervals);
    const groupHourLoads = await rebuildGroupHourLoads(ctx, branchId, window, groups);
    ctx.logger.info('Branch rebuilt from stored records', {
      branchId,
      rawRecords: intervals.length,
      staffHourFacts,
      groupHourLoads,
    });
    return { branchId, rawRecords: intervals.length, staffHourFacts, groupHourLoads };
  });
}

function assertWindow(window: DateWindow): void {
  if (window.from > window.to) {
    throw new ValidationError(`Window start ${window.from} is after its end ${window.to}`);
  }
}
