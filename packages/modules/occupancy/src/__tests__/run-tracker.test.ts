import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { applySqliteSchema, createSqliteDatabase } from '@hourwise/db';
import type { SqliteHandle } from '@hourwise/db';
import { NotFoundError } from '@hourwise/shared';
import { SqliteEtlRunRepository } from '../repositories/sqlite-occupancy-repository';
import { EtlRunTracker, getLatestRun, getRun } from '../etl/run-tracker';
import { EtlRunTerminalError } from '../errors';

describe('EtlRunTracker', () => {
  let handle: SqliteHandle;
  let repo: SqliteEtlRunRepository;
  const now = () => new Date('2025-03-10T03:00:00Z');

  beforeEach(() => {
    handle = createSqliteDatabase(':memory:');
    applySqliteSchema(handle.db);
    repo = new SqliteEtlRunRepository(handle.db);
  });

  afterEach(() => {
    handle.close();
  });

  it('starts a running run with a ULID id', async () => {
    const tracker = await EtlRunTracker.start(repo, 'daily', { now });

    expect(tracker.runId).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(await getRun(repo, tracker.runId)).toEqual({
      runId: tracker.runId,
      runType: 'daily',
      startedAt: '2025-03-10T03:00:00.000Z',
      finishedAt: null,
      status: 'running',
      progress: '0%',
      errorLog: '',
    });
  });

  it('overwrites progress and appends errors', async () => {
    const tracker = await EtlRunTracker.start(repo, 'daily', { now });
    await tracker.updateProgress('101: page 1');
    await tracker.updateProgress('101: page 2');
    await tracker.appendError('branch 202 skipped');

    const run = await getRun(repo, tracker.runId);
    expect(run.progress).toBe('101: page 2');
    expect(run.errorLog).toBe('\nbranch 202 skipped');
    expect(tracker.snapshot()).toEqual(run);
  });

  it('marks success with full progress and a finish time', async () => {
    const tracker = await EtlRunTracker.start(repo, 'full', { now });
    await tracker.succeed();

    const run = await getRun(repo, tracker.runId);
    expect(run.status).toBe('success');
    expect(run.progress).toBe('100%');
    expect(run.finishedAt).toBe('2025-03-10T03:00:00.000Z');
  });

  it('records the failure message', async () => {
    const tracker = await EtlRunTracker.start(repo, 'full', { now });
    await tracker.fail(new Error('upstream down'));

    const run = await getRun(repo, tracker.runId);
    expect(run.status).toBe('failed');
    expect(run.errorLog).toBe('\nupstream down');
    expect(run.finishedAt).toBe('2025-03-10T03:00:00.000Z');
  });

  it('rejects mutations after a terminal transition', async () => {
    const tracker = await EtlRunTracker.start(repo, 'full', { now });
    await tracker.succeed();

    await expect(tracker.updateProgress('late')).rejects.toBeInstanceOf(EtlRunTerminalError);
    await expect(tracker.fail(new Error('late'))).rejects.toBeInstanceOf(EtlRunTerminalError);
    expect((await getRun(repo, tracker.runId)).status).toBe('success');
  });

  it('throws NotFoundError for an unknown run and finds the latest one', async () => {
    await expect(getRun(repo, 'missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(getLatestRun(repo)).resolves.toBeNull();

    const tracker = await EtlRunTracker.start(repo, 'daily', { now });
    expect((await getLatestRun(repo, 'daily'))?.runId).toBe(tracker.runId);
  });
});
