import { sqliteTable, text, integer, real, index, primaryKey } from 'drizzle-orm/sqlite-core';

export const branches = sqliteTable('branches', {
  code: text('code').primaryKey(),
  name: text('name').notNull(),
});

export const metrics = sqliteTable('metrics', {
  code: text('code').primaryKey(),
  label: text('label').notNull(),
  unit: text('unit'),
  groupName: text('group_name'),
  isPlan: integer('is_plan', { mode: 'boolean' }).notNull().default(false),
  isDerived: integer('is_derived', { mode: 'boolean' }).notNull().default(false),
  aggregation: text('aggregation'),
});

export const manualSheetDaily = sqliteTable(
  'manual_sheet_daily',
  {
    branchCode: text('branch_code').notNull(),
    metricCode: text('metric_code').notNull(),
    date: text('date').notNull(),
    value: real('value').notNull(),
    source: text('source').notNull().default('manual'),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.branchCode, table.metricCode, table.date] }),
    index('idx_manual_sheet_daily_branch_date').on(table.branchCode, table.date),
  ],
);

export const plansMonthly = sqliteTable(
  'plans_monthly',
  {
    branchCode: text('branch_code').notNull(),
    metricCode: text('metric_code').notNull(),
    monthStart: text('month_start').notNull(),
    value: real('value').notNull(),
    updatedAt: text('updated_at').notNull(),
  },
  (table) => [primaryKey({ columns: [table.branchCode, table.metricCode, table.monthStart] })],
);
