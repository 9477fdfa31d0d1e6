import {
  pgTable,
  text,
  integer,
  bigint,
  boolean,
  timestamp,
  date,
  doublePrecision,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

// ── raw_records ────────────────────────────────────────────────
// Normalized fact visits, kept so hour facts can be rebuilt offline.
export const rawRecords = pgTable(
  'raw_records',
  {
    branchId: bigint('branch_id', { mode: 'number' }).notNull(),
    recordId: bigint('record_id', { mode: 'number' }).notNull(),
    staffId: bigint('staff_id', { mode: 'number' }).notNull(),
    startAt: timestamp('start_at', { withTimezone: true, mode: 'string' }).notNull(),
    endAt: timestamp('end_at', { withTimezone: true, mode: 'string' }).notNull(),
    attendance: integer('attendance').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.branchId, table.recordId] }),
    index('idx_raw_records_branch_start').on(table.branchId, table.startAt),
  ],
);

// ── staff_hour_busy ────────────────────────────────────────────
// One row per busy (staff, local date, local hour). Replaced per window.
export const staffHourBusy = pgTable(
  'staff_hour_busy',
  {
    branchId: bigint('branch_id', { mode: 'number' }).notNull(),
    staffId: bigint('staff_id', { mode: 'number' }).notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    hour: integer('hour').notNull(),
    busy: boolean('busy').notNull().default(true),
    inBenchmark: boolean('in_benchmark').notNull(),
    inGray: boolean('in_gray').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.branchId, table.staffId, table.date, table.hour] }),
    index('idx_staff_hour_busy_branch_date').on(table.branchId, table.date),
  ],
);

// ── group_hour_load ────────────────────────────────────────────
export const groupHourLoad = pgTable(
  'group_hour_load',
  {
    branchId: bigint('branch_id', { mode: 'number' }).notNull(),
    groupId: text('group_id').notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    dow: integer('dow').notNull(),
    hour: integer('hour').notNull(),
    busyCount: integer('busy_count').notNull(),
    staffTotal: integer('staff_total').notNull(),
    loadPct: doublePrecision('load_pct').notNull(),
    inBenchmark: boolean('in_benchmark').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.branchId, table.groupId, table.date, table.hour] }),
    index('idx_group_hour_load_branch_group_date').on(table.branchId, table.groupId, table.date),
  ],
);

// ── etl_runs ───────────────────────────────────────────────────
export const etlRuns = pgTable(
  'etl_runs',
  {
    runId: text('run_id').primaryKey(),
    runType: text('run_type').notNull(),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull().defaultNow(),
    finishedAt: timestamp('finished_at', { withTimezone: true }),
    status: text('status').notNull(),
    progress: text('progress').notNull().default('0%'),
    errorLog: text('error_log').notNull().default(''),
  },
  (table) => [index('idx_etl_runs_started').on(table.startedAt)],
);
