import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { applySqliteSchema, createSqliteDatabase } from '@hourwise/db';
import type { SqliteHandle } from '@hourwise/db';
import { KeyedMutex, silentLogger } from '@hourwise/core';
import { ValidationError } from '@hourwise/shared';
import { SqliteOccupancyRepository } from '../repositories/sqlite-occupancy-repository';
import { rebuildBranch } from '../etl/pipeline';
import { createHourPolicy } from '../hour-policy';
import { getGroupHeatmap } from '../queries/heatmap';
import { getGroupLoadSummary } from '../queries/load-summary';
import { createBenchmarkLoadSource, getDailyBenchmarkLoad } from '../queries/daily-benchmark-load';
import { listMonthWeeks } from '../queries/month-weeks';
import type { VisitInterval } from '../types';

const hourPolicy = createHourPolicy();
const masters = { groupId: 'masters', name: 'Masters', staffIds: [10, 11] };

function visit(recordId: number, staffId: number, start: string, end: string): VisitInterval {
  return {
    branchId: 101,
    staffId,
    recordId,
    start: new Date(start),
    end: new Date(end),
    attendanceCode: 1,
    attendanceClass: 'fact',
    updatedAt: '2025-03-10T00:00:00Z',
  };
}

describe('occupancy queries', () => {
  let handle: SqliteHandle;
  let occupancy: SqliteOccupancyRepository;

  beforeEach(async () => {
    handle = createSqliteDatabase(':memory:');
    applySqliteSchema(handle.db);
    occupancy = new SqliteOccupancyRepository(handle.db);
    const ctx = { occupancy, timezone: 'Europe/Moscow', hourPolicy, lock: new KeyedMutex(), logger: silentLogger };
    await rebuildBranch(
      ctx,
      101,
      { from: '2025-03-10', to: '2025-03-16' },
      [
        // 10:00-11:00 local on Monday
        visit(1, 10, '2025-03-10T07:00:00Z', '2025-03-10T08:00:00Z'),
        // 08:00-09:00 local on Tuesday, before benchmark hours
        visit(2, 11, '2025-03-11T05:00:00Z', '2025-03-11T06:00:00Z'),
        // 22:00-23:00 local on Wednesday, after benchmark hours
        visit(3, 10, '2025-03-12T19:00:00Z', '2025-03-12T20:00:00Z'),
      ],
      [masters],
    );
  });

  afterEach(() => {
    handle.close();
  });

  describe('getGroupHeatmap', () => {
    it('returns a week grid over benchmark hours with gray flags', async () => {
      const heatmap = await getGroupHeatmap(
        { occupancy, hourPolicy },
        { branchId: 101, group: masters, period: { kind: 'week', weekStart: '2025-03-10' } },
      );

      expect(heatmap.window).toEqual({ from: '2025-03-10', to: '2025-03-16' });
      expect(heatmap.hours).toEqual([10, 11, 12, 13, 14, 15, 16, 17, 18, 19, 20, 21]);
      expect(heatmap.days).toHaveLength(7);
      const [monday, tuesday, wednesday] = heatmap.days;
      expect(monday?.cells[0]).toEqual({ hour: 10, loadPct: 50, busyCount: 1, staffTotal: 2 });
      expect(monday?.cells[1]).toEqual({ hour: 11, loadPct: 0, busyCount: 0, staffTotal: 2 });
      expect(monday?.gray).toEqual({ early: false, late: false });
      expect(tuesday?.gray).toEqual({ early: true, late: false });
      expect(wednesday?.gray).toEqual({ early: false, late: true });
      expect(wednesday?.dow).toBe(3);
    });

    it('zero-fills days without rows using the group size', async () => {
      const heatmap = await getGroupHeatmap(
        { occupancy, hourPolicy },
        { branchId: 101, group: masters, period: { kind: 'week', weekStart: '2025-03-17' } },
      );

      const cells = heatmap.days.flatMap((d) => d.cells);
      expect(cells).toHaveLength(84);
      expect(cells.every((c) => c.loadPct === 0 && c.busyCount === 0 && c.staffTotal === 2)).toBe(true);
    });

    it('accepts explicit hours and a month period', async () => {
      const heatmap = await getGroupHeatmap(
        { occupancy, hourPolicy },
        { branchId: 101, group: masters, period: { kind: 'month', month: '2025-3' }, hours: [10, 8] },
      );

      expect(heatmap.hours).toEqual([8, 10]);
      expect(heatmap.days).toHaveLength(31);
      const tuesday = heatmap.days.find((d) => d.date === '2025-03-11');
      expect(tuesday?.cells).toEqual([
        { hour: 8, loadPct: 50, busyCount: 1, staffTotal: 2 },
        { hour: 10, loadPct: 0, busyCount: 0, staffTotal: 2 },
      ]);
    });

    it('rejects out-of-range hours', async () => {
      await expect(
        getGroupHeatmap(
          { occupancy, hourPolicy },
          { branchId: 101, group: masters, period: { kind: 'week', weekStart: '2025-03-10' }, hours: [24] },
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('getGroupLoadSummary', () => {
    it('averages benchmark hours per day, week and month', async () => {
      const summary = await getGroupLoadSummary(occupancy, { branchId: 101, groupId: 'masters', month: '2025-03' });

      expect(summary.month).toBe('2025-03-01');
      expect(summary.avgDay).toHaveLength(31);
      expect(summary.avgDay.find((d) => d.date === '2025-03-10')?.avg).toBe(4.17);
      expect(summary.avgDay.find((d) => d.date === '2025-03-11')?.avg).toBe(0);
      expect(summary.avgWeek).toEqual([
        { weekStart: '2025-02-24', avg: 0 },
        { weekStart: '2025-03-03', avg: 0 },
        { weekStart: '2025-03-10', avg: 0.6 },
        { weekStart: '2025-03-17', avg: 0 },
        { weekStart: '2025-03-24', avg: 0 },
        { weekStart: '2025-03-31', avg: 0 },
      ]);
      expect(summary.avgMonth).toBe(0.6);
    });

    it('is all zeros for a month without data', async () => {
      const summary = await getGroupLoadSummary(occupancy, { branchId: 101, groupId: 'masters', month: '2025-04' });
      expect(summary.avgMonth).toBe(0);
      expect(summary.avgDay.every((d) => d.avg === 0)).toBe(true);
    });
  });

  describe('getDailyBenchmarkLoad', () => {
    it('averages benchmark-hour load per day', async () => {
      const loads = await getDailyBenchmarkLoad(occupancy, {
        branchId: 101,
        groupIds: ['masters'],
        from: '2025-03-10',
        to: '2025-03-11',
      });
      expect([...loads]).toEqual([
        ['2025-03-10', 4.17],
        ['2025-03-11', 0],
      ]);
    });

    it('feeds a load source keyed by branch code', async () => {
      const source = createBenchmarkLoadSource(occupancy, (code) =>
        code === 'CE' ? { branchId: 101, groupIds: ['masters'] } : null,
      );

      expect((await source('CE', '2025-03-10', '2025-03-10')).get('2025-03-10')).toBe(4.17);
      expect((await source('XX', '2025-03-10', '2025-03-10')).size).toBe(0);
    });
  });
});

describe('listMonthWeeks', () => {
  it('lists the Monday of every week touching the month', () => {
    expect(listMonthWeeks('2025-03')).toEqual([
      '2025-02-24',
      '2025-03-03',
      '2025-03-10',
      '2025-03-17',
      '2025-03-24',
      '2025-03-31',
    ]);
    expect(listMonthWeeks('2024-12')).toEqual(['2024-11-25', '2024-12-02', '2024-12-09', '2024-12-16', '2024-12-23', '2024-12-30']);
  });
});
