import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { applySqliteSchema, createSqliteDatabase } from '@hourwise/db';
import type { SqliteHandle } from '@hourwise/db';
import { KeyedMutex, silentLogger } from '@hourwise/core';
import { SqliteEtlRunRepository, SqliteOccupancyRepository } from '../repositories/sqlite-occupancy-repository';
import { EtlJob, EtlJobQueue, defaultDailyTarget, planDaily, planFullRebuild, runEtl } from '../etl/jobs';
import type { EtlDeps } from '../etl/jobs';
import type { EtlRunRepository } from '../repositories/types';
import { createHourPolicy } from '../hour-policy';
import { UpstreamApiError } from '../errors';
import type { SchedulingSource } from '../upstream/scheduling-client';
import type { ResolvedGroupConfig } from '../types';

const groups: ResolvedGroupConfig = {
  branches: [
    { branchId: 101, displayName: 'Central', groups: [{ groupId: 'masters', name: 'Masters', staffIds: [10, 11] }] },
    { branchId: 202, displayName: 'North', groups: [] },
  ],
};

const visitPayload = { id: 1, staff_id: 10, datetime: '2025-03-10 10:00:00', seance_length: 3600, attendance: 1 };

function fakeSource(getRecordsPage?: SchedulingSource['getRecordsPage']): SchedulingSource {
  return {
    getRecordsPage:
      getRecordsPage ??
      (async (branchId, query) =>
        branchId === 101 && query.page === 1 ? { data: [visitPayload], totalCount: 1 } : { data: [], totalCount: 0 }),
    getStaff: async () => [],
    getCompanies: async () => [],
  };
}

describe('ETL plans', () => {
  it('covers the year and honours the branch start date for active branches', () => {
    const plan = planFullRebuild(2025, { activeBranchIds: [101], branchStartDate: '2025-03-01' });
    expect(plan(groups)).toEqual([
      { branchId: 101, window: { from: '2025-03-01', to: '2025-12-31' } },
      { branchId: 202, window: { from: '2025-01-01', to: '2025-12-31' } },
    ]);
  });

  it('applies the start date to every branch when no active list is set', () => {
    const plan = planFullRebuild(2025, { activeBranchIds: [], branchStartDate: '2025-03-01' });
    expect(plan(groups).map((p) => p.window.from)).toEqual(['2025-03-01', '2025-03-01']);
  });

  it('skips a daily run for a day before the branch start date', () => {
    expect(planDaily('2025-02-28', { activeBranchIds: [], branchStartDate: '2025-03-01' })(groups)).toEqual([]);
    expect(planDaily('2025-03-01', { activeBranchIds: [] })(groups)).toHaveLength(2);
  });

  it('targets yesterday in the business timezone', () => {
    // 00:30 in Moscow on the 11th
    expect(defaultDailyTarget('Europe/Moscow', new Date('2025-03-10T21:30:00Z'))).toBe('2025-03-10');
  });
});

describe('runEtl', () => {
  let handle: SqliteHandle;
  let deps: EtlDeps;
  let occupancy: SqliteOccupancyRepository;

  beforeEach(() => {
    handle = createSqliteDatabase(':memory:');
    applySqliteSchema(handle.db);
    occupancy = new SqliteOccupancyRepository(handle.db);
    deps = {
      runs: new SqliteEtlRunRepository(handle.db),
      source: fakeSource(),
      pipeline: {
        occupancy,
        timezone: 'Europe/Moscow',
        hourPolicy: createHourPolicy(),
        lock: new KeyedMutex(),
        logger: silentLogger,
      },
      resolveGroups: async () => groups,
      pageSize: 50,
      now: () => new Date('2025-03-11T03:00:00Z'),
    };
  });

  afterEach(() => {
    handle.close();
  });

  it('fetches, rebuilds and marks the run successful', async () => {
    const run = await runEtl(deps, 'daily', planDaily('2025-03-10', { activeBranchIds: [] }));

    expect(run.status).toBe('success');
    expect(run.progress).toBe('100%');
    const window = { from: '2025-03-10', to: '2025-03-10' };
    expect(await occupancy.listBusyStaffHours(101, window)).toEqual([{ staffId: 10, date: '2025-03-10', hour: 10 }]);
    const [load] = await occupancy.listGroupHourLoads(101, ['masters'], window, { hours: [10] });
    expect(load?.loadPct).toBe(50);
  });

  it('turns an upstream failure into a failed run', async () => {
    deps.source = fakeSource(async () => {
      throw new UpstreamApiError('Scheduling API request failed after 3 attempts', { retryable: true });
    });

    const run = await runEtl(deps, 'daily', planDaily('2025-03-10', { activeBranchIds: [] }));

    expect(run.status).toBe('failed');
    expect(run.errorLog).toBe('\nScheduling API request failed after 3 attempts');
    expect(run.finishedAt).toBe('2025-03-11T03:00:00.000Z');
  });

  it('fails with a cancelled entry when cancelled', async () => {
    const run = await runEtl(deps, 'daily', planDaily('2025-03-10', { activeBranchIds: [] }), () => true);

    expect(run.status).toBe('failed');
    expect(run.errorLog).toBe('\ncancelled');
    expect(await occupancy.listBusyStaffHours(101, { from: '2025-03-10', to: '2025-03-10' })).toEqual([]);
  });
});

describe('EtlJobQueue', () => {
  let handle: SqliteHandle;
  let deps: EtlDeps;

  beforeEach(() => {
    handle = createSqliteDatabase(':memory:');
    applySqliteSchema(handle.db);
    deps = {
      runs: new SqliteEtlRunRepository(handle.db),
      source: fakeSource(),
      pipeline: {
        occupancy: new SqliteOccupancyRepository(handle.db),
        timezone: 'Europe/Moscow',
        hourPolicy: createHourPolicy(),
        lock: new KeyedMutex(),
        logger: silentLogger,
      },
      resolveGroups: async () => groups,
      pageSize: 50,
    };
  });

  afterEach(() => {
    handle.close();
  });

  it('runs jobs in submission order', async () => {
    const queue = new EtlJobQueue(deps, silentLogger);
    const plan = planDaily('2025-03-10', { activeBranchIds: [] });
    const first = queue.submit(new EtlJob('daily', plan));
    const second = queue.submit(new EtlJob('daily', plan));

    expect(first.job.status).toBe('queued');
    const [a, b] = await Promise.all([first.done, second.done]);

    expect(a.status).toBe('success');
    expect(b.status).toBe('success');
    expect(a.run && b.run && a.run.runId < b.run.runId).toBe(true);
    expect(queue.list().map((j) => j.status)).toEqual(['success', 'success']);
    expect(queue.get(first.job.jobId)).toBe(first.job);
  });

  it('forgets the oldest finished jobs beyond the history limit', async () => {
    const queue = new EtlJobQueue(deps, silentLogger, 1);
    const plan = planDaily('2025-03-10', { activeBranchIds: [] });
    const first = queue.submit(new EtlJob('daily', plan));
    const second = queue.submit(new EtlJob('daily', plan));

    await Promise.all([first.done, second.done]);

    expect(queue.list()).toEqual([second.job]);
    expect(queue.get(first.job.jobId)).toBeUndefined();
  });

  it('applies a cancel requested while queued', async () => {
    const queue = new EtlJobQueue(deps, silentLogger);
    const { job, done } = queue.submit(new EtlJob('full', planFullRebuild(2025, { activeBranchIds: [] })));
    job.cancel();

    const outcome = await done;
    expect(outcome.status).toBe('failed');
    expect(outcome.run?.errorLog).toBe('\ncancelled');
    expect(job.isCancelled).toBe(true);
  });

  it('resolves with a failed outcome when the run cannot be recorded', async () => {
    const brokenRuns: EtlRunRepository = {
      insertRun: vi.fn(async () => {
        throw new Error('database unavailable');
      }),
      updateRun: async () => {},
      getRun: async () => null,
      getLatestRun: async () => null,
    };
    const queue = new EtlJobQueue({ ...deps, runs: brokenRuns }, silentLogger);

    const outcome = await queue.submit(new EtlJob('daily', planDaily('2025-03-10', { activeBranchIds: [] }))).done;

    expect(outcome).toMatchObject({ status: 'failed', run: null, error: 'database unavailable' });
  });
});
