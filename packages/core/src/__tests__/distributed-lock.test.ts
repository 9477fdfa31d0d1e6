import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PgDialect } from 'drizzle-orm/pg-core';
import type { SQL } from 'drizzle-orm';
import type { Database } from '@hourwise/db';
import type { Logger } from '../observability/logger';
import { ConflictError } from '@hourwise/shared';
import { silentLogger } from '../observability/logger';
import { PgRebuildLock, cleanExpiredLocks } from '../locks/distributed-lock';

const dialect = new PgDialect();
const mockExecute = vi.fn();
const db = { execute: mockExecute } as unknown as Database;

function renderedCall(index: number) {
  const query = mockExecute.mock.calls[index]?.[0] as SQL;
  return dialect.sqlToQuery(query);
}

describe('PgRebuildLock', () => {
  beforeEach(() => {
    mockExecute.mockReset();
  });

  it('acquires, runs and releases', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'rebuild:101' }]).mockResolvedValueOnce([{ lock_key: 'rebuild:101' }]);
    const lock = new PgRebuildLock(db, { holderId: 'holder-a', ttlMs: 60_000, logger: silentLogger });

    await expect(lock.run('101', async () => 'done')).resolves.toBe('done');

    const acquire = renderedCall(0);
    expect(acquire.sql).toContain('INSERT INTO distributed_locks');
    expect(acquire.params.slice(0, 3)).toEqual(['rebuild:101', 'holder-a', 60_000]);
    const release = renderedCall(1);
    expect(release.sql).toContain('DELETE FROM distributed_locks');
    expect(release.params).toEqual(['rebuild:101', 'holder-a']);
  });

  it('fails fast when another holder owns the lock', async () => {
    mockExecute.mockResolvedValueOnce([]);
    const lock = new PgRebuildLock(db, { holderId: 'holder-b', logger: silentLogger });
    const fn = vi.fn(async () => 'never');

    await expect(lock.run('101', fn)).rejects.toBeInstanceOf(ConflictError);
    expect(fn).not.toHaveBeenCalled();
    expect(mockExecute).toHaveBeenCalledTimes(1);
  });

  it('releases even when the work throws', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'rebuild:7' }]).mockResolvedValueOnce([]);
    const lock = new PgRebuildLock(db, { holderId: 'holder-c', logger: silentLogger });

    await expect(
      lock.run('7', async () => {
        throw new Error('rebuild failed');
      }),
    ).rejects.toThrow('rebuild failed');
    expect(renderedCall(1).sql).toContain('DELETE FROM distributed_locks');
  });

  describe('lease renewal', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('extends the lease while the work runs and stops once released', async () => {
      mockExecute.mockResolvedValue([{ lock_key: 'rebuild:9' }]);
      const lock = new PgRebuildLock(db, {
        holderId: 'holder-e',
        ttlMs: 90_000,
        renewEveryMs: 30_000,
        logger: silentLogger,
      });
      let finish: () => void = () => {};
      const work = new Promise<void>((resolve) => {
        finish = resolve;
      });

      const running = lock.run('9', () => work);
      await vi.advanceTimersByTimeAsync(65_000);
      finish();
      await running;
      await vi.advanceTimersByTimeAsync(60_000);

      expect(mockExecute).toHaveBeenCalledTimes(4);
      const renew = renderedCall(1);
      expect(renew.sql).toContain('UPDATE distributed_locks');
      expect(renew.params).toEqual([90_000, 'rebuild:9', 'holder-e']);
      expect(renderedCall(2).sql).toContain('UPDATE distributed_locks');
      expect(renderedCall(3).sql).toContain('DELETE FROM distributed_locks');
    });

    it('warns when another holder has taken the lease', async () => {
      mockExecute
        .mockResolvedValueOnce([{ lock_key: 'rebuild:9' }])
        .mockResolvedValueOnce([])
        .mockResolvedValueOnce([{ lock_key: 'rebuild:9' }]);
      const warn = vi.fn();
      const logger: Logger = { ...silentLogger, warn };
      const lock = new PgRebuildLock(db, { holderId: 'holder-f', ttlMs: 3_000, logger });
      let finish: () => void = () => {};
      const work = new Promise<void>((resolve) => {
        finish = resolve;
      });

      const running = lock.run('9', () => work);
      await vi.advanceTimersByTimeAsync(1_000);
      finish();
      await running;

      expect(warn).toHaveBeenCalledWith('Rebuild lock lease lost', { lockKey: 'rebuild:9' });
    });
  });

  it('still returns the result when release fails', async () => {
    mockExecute.mockResolvedValueOnce([{ lock_key: 'rebuild:7' }]).mockRejectedValueOnce(new Error('connection lost'));
    const lock = new PgRebuildLock(db, { holderId: 'holder-d', logger: silentLogger });
    await expect(lock.run('7', async () => 5)).resolves.toBe(5);
  });
});

describe('cleanExpiredLocks', () => {
  it('returns the number of removed rows', async () => {
    mockExecute.mockReset();
    mockExecute.mockResolvedValueOnce([{ lock_key: 'a' }, { lock_key: 'b' }]);
    await expect(cleanExpiredLocks(db)).resolves.toBe(2);
  });
});
