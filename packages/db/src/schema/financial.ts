import {
  pgTable,
  text,
  boolean,
  timestamp,
  date,
  doublePrecision,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';

export const branches = pgTable('branches', {
  code: text('code').primaryKey(),
  name: text('name').notNull(),
});

export const metrics = pgTable('metrics', {
  code: text('code').primaryKey(),
  label: text('label').notNull(),
  unit: text('unit'),
  groupName: text('group_name'),
  isPlan: boolean('is_plan').notNull().default(false),
  isDerived: boolean('is_derived').notNull().default(false),
  aggregation: text('aggregation'),
});

// ── manual_sheet_daily ─────────────────────────────────────────
// Daily figures keyed by (branch, metric, date). Last upsert wins.
export const manualSheetDaily = pgTable(
  'manual_sheet_daily',
  {
    branchCode: text('branch_code').notNull(),
    metricCode: text('metric_code').notNull(),
    date: date('date', { mode: 'string' }).notNull(),
    value: doublePrecision('value').notNull(),
    source: text('source').notNull().default('manual'),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.branchCode, table.metricCode, table.date] }),
    index('idx_manual_sheet_daily_branch_date').on(table.branchCode, table.date),
  ],
);

export const plansMonthly = pgTable(
  'plans_monthly',
  {
    branchCode: text('branch_code').notNull(),
    metricCode: text('metric_code').notNull(),
    monthStart: date('month_start', { mode: 'string' }).notNull(),
    value: doublePrecision('value').notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.branchCode, table.metricCode, table.monthStart] }),
    index('idx_plans_monthly_branch_month').on(table.branchCode, table.monthStart),
  ],
);
