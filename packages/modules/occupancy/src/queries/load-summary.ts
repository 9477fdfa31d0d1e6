import { addDays, eachDay, monthEnd, parseInput, parseMonth, startOfIsoWeek } from '@hourwise/shared';
import type { IsoDate } from '@hourwise/shared';
import { round2 } from '../builders/group-load';
import type { OccupancyRepository } from '../repositories/types';
import { loadSummaryInputSchema } from '../validation';

export interface LoadSummary {
  month: IsoDate;
  avgDay: Array<{ date: IsoDate; avg: number }>;
  avgWeek: Array<{ weekStart: IsoDate; avg: number }>;
  avgMonth: number;
}

function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return round2(values.reduce((sum, v) => sum + v, 0) / values.length);
}

/**
 * Benchmark-hour load averages of one group for a month: per day, per
 * Monday-start week (only days inside the month count) and overall.
 */
export async function getGroupLoadSummary(
  occupancy: OccupancyRepository,
  input: { branchId: number; groupId: string; month: string },
): Promise<LoadSummary> {
  const { branchId, groupId, month } = parseInput(loadSummaryInputSchema, input, 'Invalid load summary request');
  const first = parseMonth(month);
  const last = monthEnd(first);

  const rows = await occupancy.listGroupHourLoads(branchId, [groupId], { from: first, to: last }, { benchmarkOnly: true });
  const byDate = new Map<IsoDate, number[]>();
  for (const row of rows) {
    const values = byDate.get(row.date);
    if (values) values.push(row.loadPct);
    else byDate.set(row.date, [row.loadPct]);
  }

  const avgDay = eachDay(first, last).map((date) => ({ date, avg: average(byDate.get(date) ?? []) }));

  const avgWeek: LoadSummary['avgWeek'] = [];
  for (let weekStart = startOfIsoWeek(first); weekStart <= last; weekStart = addDays(weekStart, 7)) {
    const from = weekStart < first ? first : weekStart;
    const weekEnd = addDays(weekStart, 6);
    const to = weekEnd > last ? last : weekEnd;
    avgWeek.push({ weekStart, avg: average(eachDay(from, to).flatMap((d) => byDate.get(d) ?? [])) });
  }

  return {
    month: first,
    avgDay,
    avgWeek,
    avgMonth: average(rows.map((r) => r.loadPct)),
  };
}
