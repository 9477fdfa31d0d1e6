import { pgTable, text, timestamp, jsonb } from 'drizzle-orm/pg-core';

// ── distributed_locks ──────────────────────────────────────────
// Lease rows; a row whose expires_at has passed may be taken over.
export const distributedLocks = pgTable('distributed_locks', {
  lockKey: text('lock_key').primaryKey(),
  holderId: text('holder_id').notNull(),
  acquiredAt: timestamp('acquired_at', { withTimezone: true }).notNull().defaultNow(),
  expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
  metadata: jsonb('metadata').notNull().default({}),
});
