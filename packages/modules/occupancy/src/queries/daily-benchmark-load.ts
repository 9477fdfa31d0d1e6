import { parseInput } from '@hourwise/shared';
import type { IsoDate } from '@hourwise/shared';
import { round2 } from '../builders/group-load';
import type { OccupancyRepository } from '../repositories/types';
import { dailyLoadInputSchema } from '../validation';

/**
 * Average benchmark-hour load per day across the given groups. Days with no
 * rows are absent from the result rather than reported as 0.
 */
export async function getDailyBenchmarkLoad(
  occupancy: OccupancyRepository,
  input: { branchId: number; groupIds: string[]; from: IsoDate; to: IsoDate },
): Promise<Map<IsoDate, number>> {
  const { branchId, groupIds, from, to } = parseInput(dailyLoadInputSchema, input, 'Invalid daily load request');
  const result = new Map<IsoDate, number>();
  if (groupIds.length === 0) return result;

  const rows = await occupancy.listGroupHourLoads(branchId, groupIds, { from, to }, { benchmarkOnly: true });
  const sums = new Map<IsoDate, { total: number; count: number }>();
  for (const row of rows) {
    const acc = sums.get(row.date) ?? { total: 0, count: 0 };
    acc.total += row.loadPct;
    acc.count += 1;
    sums.set(row.date, acc);
  }
  for (const [date, { total, count }] of [...sums].sort(([a], [b]) => (a < b ? -1 : 1))) {
    result.set(date, round2(total / count));
  }
  return result;
}

/** Which occupancy branch and groups stand behind a reporting branch code. */
export type BenchmarkLoadTarget = { branchId: number; groupIds: string[] };

/**
 * Adapts occupancy into the `load_percent` series the financial reports
 * read. Unknown branch codes yield no values.
 */
export function createBenchmarkLoadSource(
  occupancy: OccupancyRepository,
  resolveTarget: (branchCode: string) => Promise<BenchmarkLoadTarget | null> | BenchmarkLoadTarget | null,
) {
  return async (branchCode: string, from: IsoDate, to: IsoDate): Promise<Map<IsoDate, number>> => {
    const target = await resolveTarget(branchCode);
    if (!target) return new Map();
    return getDailyBenchmarkLoad(occupancy, { ...target, from, to });
  };
}
