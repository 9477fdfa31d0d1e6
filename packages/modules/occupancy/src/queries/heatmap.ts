import { addDays, eachDay, isoWeekday, monthEnd, parseInput, parseMonth } from '@hourwise/shared';
import type { IsoDate } from '@hourwise/shared';
import type { HourPolicy } from '../hour-policy';
import type { OccupancyRepository } from '../repositories/types';
import type { DateWindow, GroupDefinition, GroupHourLoad } from '../types';
import { heatmapInputSchema } from '../validation';

export type HeatmapPeriod = { kind: 'week'; weekStart: IsoDate } | { kind: 'month'; month: string };

export interface HeatmapInput {
  branchId: number;
  group: GroupDefinition;
  period: HeatmapPeriod;
  /** Defaults to the benchmark hours. */
  hours?: number[];
}

export interface HeatmapCell {
  hour: number;
  loadPct: number;
  busyCount: number;
  staffTotal: number;
}

export interface GrayFlags {
  early: boolean;
  late: boolean;
}

export interface HeatmapDay {
  date: IsoDate;
  dow: number;
  cells: HeatmapCell[];
  gray: GrayFlags;
}

export interface GroupHeatmap {
  branchId: number;
  groupId: string;
  window: DateWindow;
  hours: number[];
  days: HeatmapDay[];
}

export interface HeatmapDeps {
  occupancy: OccupancyRepository;
  hourPolicy: HourPolicy;
}

export function periodWindow(period: HeatmapPeriod): DateWindow {
  if (period.kind === 'week') {
    return { from: period.weekStart, to: addDays(period.weekStart, 6) };
  }
  const from = parseMonth(period.month);
  return { from, to: monthEnd(from) };
}

/**
 * Dense days × hours grid for one group. Missing cells read as an idle
 * group of its configured size. Gray flags mark days where any group
 * member worked before or after the benchmark hours.
 */
export async function getGroupHeatmap(deps: HeatmapDeps, input: HeatmapInput): Promise<GroupHeatmap> {
  const { branchId, period } = parseInput(
    heatmapInputSchema,
    { branchId: input.branchId, period: input.period, hours: input.hours },
    'Invalid heatmap request',
  );
  const { group } = input;
  const window = periodWindow(period);
  const hours = input.hours ? [...new Set(input.hours)].sort((a, b) => a - b) : deps.hourPolicy.benchmarkHours();

  const rows = await deps.occupancy.listGroupHourLoads(branchId, [group.groupId], window, { hours });
  const byCell = new Map<string, GroupHourLoad>();
  for (const row of rows) byCell.set(`${row.date}|${row.hour}`, row);

  const gray = new Map<IsoDate, GrayFlags>();
  if (group.staffIds.length > 0) {
    const busy = await deps.occupancy.listBusyStaffHours(branchId, window, group.staffIds);
    for (const { date, hour } of busy) {
      if (!deps.hourPolicy.inGray(hour)) continue;
      const flags = gray.get(date) ?? { early: false, late: false };
      if (hour < deps.hourPolicy.startHour) flags.early = true;
      else flags.late = true;
      gray.set(date, flags);
    }
  }

  const staffTotal = new Set(group.staffIds).size;
  const days = eachDay(window.from, window.to).map((date) => ({
    date,
    dow: isoWeekday(date),
    cells: hours.map((hour): HeatmapCell => {
      const row = byCell.get(`${date}|${hour}`);
      return row
        ? { hour, loadPct: row.loadPct, busyCount: row.busyCount, staffTotal: row.staffTotal }
        : { hour, loadPct: 0, busyCount: 0, staffTotal };
    }),
    gray: gray.get(date) ?? { early: false, late: false },
  }));

  return { branchId, groupId: group.groupId, window, hours, days };
}
