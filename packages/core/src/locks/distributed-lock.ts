import { hostname } from 'node:os';
import { sql } from 'drizzle-orm';
import type { Database } from '@hourwise/db';
import { ConflictError, generateUlid } from '@hourwise/shared';
import { logger as defaultLogger } from '../observability/logger';
import type { Logger } from '../observability/logger';
import type { RebuildLock } from './keyed-mutex';

// ── Types ────────────────────────────────────────────────────────────

export interface LockResult {
  acquired: boolean;
  lockKey: string;
  holderId: string;
}

export interface LockMetadata {
  trigger?: string;
  runId?: string;
  [key: string]: unknown;
}

type Executor = Pick<Database, 'execute'>;

// ── Core Lock Operations ────────────────────────────────────────────

/**
 * Attempt to acquire a distributed lock.
 *
 * INSERT ON CONFLICT with stale takeover: an existing row is replaced only
 * when its `expires_at` has passed. Empty RETURNING = held by someone else.
 */
export async function tryAcquireLock(
  db: Executor,
  lockKey: string,
  holderId: string,
  ttlMs: number,
  metadata: LockMetadata = {},
): Promise<LockResult> {
  const result = await db.execute<{ lock_key: string }>(sql`
    INSERT INTO distributed_locks (lock_key, holder_id, expires_at, metadata)
    VALUES (
      ${lockKey},
      ${holderId},
      NOW() + (${ttlMs} || ' milliseconds')::interval,
      ${JSON.stringify(metadata)}::jsonb
    )
    ON CONFLICT (lock_key)
    DO UPDATE SET
      holder_id = EXCLUDED.holder_id,
      acquired_at = NOW(),
      expires_at = EXCLUDED.expires_at,
      metadata = EXCLUDED.metadata
    WHERE distributed_locks.expires_at < NOW()
    RETURNING lock_key
  `);

  return {
    acquired: Array.from(result).length > 0,
    lockKey,
    holderId,
  };
}

/** Extends the lease. Only the current holder can renew. */
export async function renewLock(db: Executor, lockKey: string, holderId: string, ttlMs: number): Promise<boolean> {
  const result = await db.execute<{ lock_key: string }>(sql`
    UPDATE distributed_locks
    SET expires_at = NOW() + (${ttlMs} || ' milliseconds')::interval
    WHERE lock_key = ${lockKey}
      AND holder_id = ${holderId}
    RETURNING lock_key
  `);
  return Array.from(result).length > 0;
}

/** Only deletes if the caller is the current holder. */
export async function releaseLock(db: Executor, lockKey: string, holderId: string): Promise<boolean> {
  const result = await db.execute<{ lock_key: string }>(sql`
    DELETE FROM distributed_locks
    WHERE lock_key = ${lockKey}
      AND holder_id = ${holderId}
    RETURNING lock_key
  `);
  return Array.from(result).length > 0;
}

export async function cleanExpiredLocks(db: Executor): Promise<number> {
  const result = await db.execute<{ lock_key: string }>(sql`
    DELETE FROM distributed_locks
    WHERE expires_at < NOW()
    RETURNING lock_key
  `);
  return Array.from(result).length;
}

// ── Rebuild lock ────────────────────────────────────────────────────

export function generateHolderId(): string {
  return `${hostname()}-${process.pid}-${generateUlid()}`;
}

export interface PgRebuildLockOptions {
  ttlMs?: number;
  /** How often the lease is extended while `fn` runs. Defaults to a third of `ttlMs`. */
  renewEveryMs?: number;
  keyPrefix?: string;
  holderId?: string;
  logger?: Logger;
}

/**
 * Cross-process single writer per key, backed by `distributed_locks`.
 * A held lock fails fast with ConflictError instead of queueing. The lease
 * is renewed while the work runs, so rebuilds may outlast `ttlMs`.
 */
export class PgRebuildLock implements RebuildLock {
  private readonly ttlMs: number;
  private readonly renewEveryMs: number;
  private readonly keyPrefix: string;
  private readonly holderId: string;
  private readonly log: Logger;

  constructor(
    private readonly db: Executor,
    options: PgRebuildLockOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? 30 * 60_000;
    this.renewEveryMs = Math.max(1, options.renewEveryMs ?? Math.floor(this.ttlMs / 3));
    this.keyPrefix = options.keyPrefix ?? 'rebuild:';
    this.holderId = options.holderId ?? generateHolderId();
    this.log = options.logger ?? defaultLogger;
  }

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lockKey = `${this.keyPrefix}${key}`;
    const lock = await tryAcquireLock(this.db, lockKey, this.holderId, this.ttlMs, { trigger: 'rebuild' });
    if (!lock.acquired) {
      throw new ConflictError(`Rebuild already in progress for ${key}`);
    }

    const renewal = setInterval(() => {
      void this.renew(lockKey);
    }, this.renewEveryMs);
    renewal.unref();

    try {
      return await fn();
    } finally {
      clearInterval(renewal);
      try {
        await releaseLock(this.db, lockKey, this.holderId);
      } catch (releaseErr) {
        // Never throw from finally; the lease expires on its own.
        this.log.warn('Failed to release rebuild lock', {
          lockKey,
          error: { message: releaseErr instanceof Error ? releaseErr.message : String(releaseErr) },
        });
      }
    }
  }

  private async renew(lockKey: string): Promise<void> {
    try {
      const renewed = await renewLock(this.db, lockKey, this.holderId, this.ttlMs);
      if (!renewed) {
        this.log.warn('Rebuild lock lease lost', { lockKey });
      }
    } catch (err) {
      this.log.warn('Failed to renew rebuild lock', {
        lockKey,
        error: { message: err instanceof Error ? err.message : String(err) },
      });
    }
  }
}
