import { monotonicFactory } from 'ulid';

const ulid = monotonicFactory();

/** Monotonic ULID; ids generated later in the same process always sort after earlier ones. */
export function generateUlid(seedTime?: number): string {
  return ulid(seedTime);
}
