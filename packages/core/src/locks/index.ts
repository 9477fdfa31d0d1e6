export { KeyedMutex } from './keyed-mutex';
export type { RebuildLock } from './keyed-mutex';
export {
  tryAcquireLock,
  renewLock,
  releaseLock,
  cleanExpiredLocks,
  generateHolderId,
  PgRebuildLock,
} from './distributed-lock';
export type { LockResult, LockMetadata, PgRebuildLockOptions } from './distributed-lock';
