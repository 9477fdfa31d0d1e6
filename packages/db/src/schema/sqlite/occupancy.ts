import { sqliteTable, text, integer, real, index, primaryKey } from 'drizzle-orm/sqlite-core';

export const rawRecords = sqliteTable(
  'raw_records',
  {
    branchId: integer('branch_id').notNull(),
    recordId: integer('record_id').notNull(),
    staffId: integer('staff_id').notNull(),
    startAt: text('start_at').notNull(),
    endAt: text('end_at').notNull(),
    attendance: integer('attendance').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [primaryKey({ columns: [table.branchId, table.recordId] })],
);

export const staffHourBusy = sqliteTable(
  'staff_hour_busy',
  {
    branchId: integer('branch_id').notNull(),
    staffId: integer('staff_id').notNull(),
    date: text('date').notNull(),
    hour: integer('hour').notNull(),
    busy: integer('busy', { mode: 'boolean' }).notNull().default(true),
    inBenchmark: integer('in_benchmark', { mode: 'boolean' }).notNull(),
    inGray: integer('in_gray', { mode: 'boolean' }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.branchId, table.staffId, table.date, table.hour] }),
    index('idx_staff_hour_busy_branch_date').on(table.branchId, table.date),
  ],
);

export const groupHourLoad = sqliteTable(
  'group_hour_load',
  {
    branchId: integer('branch_id').notNull(),
    groupId: text('group_id').notNull(),
    date: text('date').notNull(),
    dow: integer('dow').notNull(),
    hour: integer('hour').notNull(),
    busyCount: integer('busy_count').notNull(),
    staffTotal: integer('staff_total').notNull(),
    loadPct: real('load_pct').notNull(),
    inBenchmark: integer('in_benchmark', { mode: 'boolean' }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.branchId, table.groupId, table.date, table.hour] }),
    index('idx_group_hour_load_branch_group_date').on(table.branchId, table.groupId, table.date),
  ],
);

export const etlRuns = sqliteTable('etl_runs', {
  runId: text('run_id').primaryKey(),
  runType: text('run_type').notNull(),
  startedAt: text('started_at').notNull(),
  finishedAt: text('finished_at'),
  status: text('status').notNull(),
  progress: text('progress').notNull().default('0%'),
  errorLog: text('error_log').notNull().default(''),
});
