import { eachDay, isoWeekday } from '@hourwise/shared';
import type { HourPolicy } from '../hour-policy';
import type { BusyStaffHour, DateWindow, GroupDefinition, GroupHourLoad } from '../types';

/**
 * Rounds to two decimals once, where the percentage is produced. Exact
 * halves go to the even neighbour, so 3.125 becomes 3.12 and 9.375 becomes 9.38.
 */
export function round2(value: number): number {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  let rounded = diff < 0.5 ? floor : floor + 1;
  if (diff === 0.5 && floor % 2 === 0) rounded = floor;
  return rounded / 100;
}

export function loadPercent(busyCount: number, staffTotal: number): number {
  if (staffTotal === 0) return 0;
  return round2((busyCount / staffTotal) * 100);
}

/**
 * Dense load grid: one row per date in the window, per hour 0-23, per group.
 * Hours without busy staff still get a row with load 0.
 */
export function buildGroupHourLoads(
  branchId: number,
  busyStaffHours: readonly BusyStaffHour[],
  groups: readonly GroupDefinition[],
  window: DateWindow,
  hourPolicy: HourPolicy,
): GroupHourLoad[] {
  const busyBySlot = new Map<string, Set<number>>();
  for (const row of busyStaffHours) {
    const key = `${row.date}|${row.hour}`;
    let set = busyBySlot.get(key);
    if (!set) {
      set = new Set();
      busyBySlot.set(key, set);
    }
    set.add(row.staffId);
  }

  const members = groups.map((g) => ({ groupId: g.groupId, staff: [...new Set(g.staffIds)] }));
  const rows: GroupHourLoad[] = [];

  for (const date of eachDay(window.from, window.to)) {
    const dow = isoWeekday(date);
    for (let hour = 0; hour < 24; hour++) {
      const busy = busyBySlot.get(`${date}|${hour}`);
      const inBenchmark = hourPolicy.inBenchmark(hour);
      for (const group of members) {
        const busyCount = busy ? group.staff.filter((id) => busy.has(id)).length : 0;
        const staffTotal = group.staff.length;
        rows.push({
          branchId,
          groupId: group.groupId,
          date,
          dow,
          hour,
          busyCount,
          staffTotal,
          loadPct: loadPercent(busyCount, staffTotal),
          inBenchmark,
        });
      }
    }
  }
  return rows;
}
