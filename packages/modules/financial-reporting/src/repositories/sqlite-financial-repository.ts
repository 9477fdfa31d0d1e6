import { and, asc, between, desc, eq, inArray, sql } from 'drizzle-orm';
import { sqliteSchema } from '@hourwise/db';
import type { SqliteDatabase } from '@hourwise/db';
import type {
  Branch,
  DailyMetricFact,
  DateWindow,
  MetricDefinition,
  MonthlyPlan,
  MonthlyTotal,
} from '../types';
import type { FinancialRepository } from './types';
import { chunk, toAggregation, toNumber } from './row-mappers';

const { branches, metrics, manualSheetDaily, plansMonthly } = sqliteSchema;

const factMonth = sql<string>`substr(${manualSheetDaily.date}, 1, 7)`;

export interface SqliteFinancialRepositoryOptions {
  now?: () => Date;
}

export class SqliteFinancialRepository implements FinancialRepository {
  private readonly now: () => Date;

  constructor(
    private readonly db: SqliteDatabase,
    options: SqliteFinancialRepositoryOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async upsertDailyFacts(facts: readonly DailyMetricFact[]): Promise<number> {
    if (facts.length === 0) return 0;
    const updatedAt = this.now().toISOString();
    this.db.transaction((tx) => {
      for (const part of chunk(facts)) {
        tx.insert(manualSheetDaily)
          .values(part.map((f) => ({ ...f, updatedAt })))
          .onConflictDoUpdate({
            target: [manualSheetDaily.branchCode, manualSheetDaily.metricCode, manualSheetDaily.date],
            set: {
              value: sql`excluded.value`,
              source: sql`excluded.source`,
              updatedAt: sql`excluded.updated_at`,
            },
          })
          .run();
      }
    });
    return facts.length;
  }

  async listDailyFacts(
    branchCode: string,
    window: DateWindow,
    metricCodes?: readonly string[],
  ): Promise<DailyMetricFact[]> {
    if (metricCodes && metricCodes.length === 0) return [];
    return this.db
      .select({
        branchCode: manualSheetDaily.branchCode,
        metricCode: manualSheetDaily.metricCode,
        date: manualSheetDaily.date,
        value: manualSheetDaily.value,
        source: manualSheetDaily.source,
      })
      .from(manualSheetDaily)
      .where(
        and(
          eq(manualSheetDaily.branchCode, branchCode),
          between(manualSheetDaily.date, window.from, window.to),
          metricCodes ? inArray(manualSheetDaily.metricCode, [...metricCodes]) : undefined,
        ),
      )
      .orderBy(asc(manualSheetDaily.date), asc(manualSheetDaily.metricCode))
      .all();
  }

  async monthlyFactTotals(branchCode: string, metricCodes: readonly string[]): Promise<MonthlyTotal[]> {
    if (metricCodes.length === 0) return [];
    const rows = this.db
      .select({
        metricCode: manualSheetDaily.metricCode,
        month: factMonth,
        total: sql<number>`sum(${manualSheetDaily.value})`,
      })
      .from(manualSheetDaily)
      .where(and(eq(manualSheetDaily.branchCode, branchCode), inArray(manualSheetDaily.metricCode, [...metricCodes])))
      .groupBy(manualSheetDaily.metricCode, factMonth)
      .orderBy(asc(factMonth), asc(manualSheetDaily.metricCode))
      .all();
    return rows.map((r) => ({ metricCode: r.metricCode, month: r.month, value: toNumber(r.total) }));
  }

  async listFactMonths(branchCode: string): Promise<string[]> {
    const rows = this.db
      .selectDistinct({ month: factMonth })
      .from(manualSheetDaily)
      .where(eq(manualSheetDaily.branchCode, branchCode))
      .orderBy(desc(factMonth))
      .all();
    return rows.map((r) => r.month);
  }

  async listFactBranchCodes(): Promise<string[]> {
    const rows = this.db
      .selectDistinct({ code: manualSheetDaily.branchCode })
      .from(manualSheetDaily)
      .orderBy(asc(manualSheetDaily.branchCode))
      .all();
    return rows.map((r) => r.code);
  }

  async mergeBranchCode(alias: string, canonical: string): Promise<number> {
    if (alias === canonical) return 0;
    return this.db.transaction((tx) => {
      const moved = tx
        .select({ n: sql<number>`count(*)` })
        .from(manualSheetDaily)
        .where(eq(manualSheetDaily.branchCode, alias))
        .get();
      const count = toNumber(moved?.n ?? 0);
      if (count === 0) return 0;
      tx.run(sql`
        INSERT INTO manual_sheet_daily (branch_code, metric_code, date, value, source, updated_at)
        SELECT ${canonical}, metric_code, date, value, source, updated_at
        FROM manual_sheet_daily
        WHERE branch_code = ${alias}
        ON CONFLICT (branch_code, metric_code, date) DO UPDATE SET
          value = excluded.value,
          source = excluded.source,
          updated_at = excluded.updated_at
      `);
      tx.delete(manualSheetDaily).where(eq(manualSheetDaily.branchCode, alias)).run();
      return count;
    });
  }

  async upsertPlan(plan: MonthlyPlan): Promise<void> {
    this.db
      .insert(plansMonthly)
      .values({ ...plan, updatedAt: this.now().toISOString() })
      .onConflictDoUpdate({
        target: [plansMonthly.branchCode, plansMonthly.metricCode, plansMonthly.monthStart],
        set: { value: sql`excluded.value`, updatedAt: sql`excluded.updated_at` },
      })
      .run();
  }

  async listPlans(branchCode: string, metricCodes: readonly string[], monthStart?: string): Promise<MonthlyPlan[]> {
    if (metricCodes.length === 0) return [];
    return this.db
      .select({
        branchCode: plansMonthly.branchCode,
        metricCode: plansMonthly.metricCode,
        monthStart: plansMonthly.monthStart,
        value: plansMonthly.value,
      })
      .from(plansMonthly)
      .where(
        and(
          eq(plansMonthly.branchCode, branchCode),
          inArray(plansMonthly.metricCode, [...metricCodes]),
          monthStart ? eq(plansMonthly.monthStart, monthStart) : undefined,
        ),
      )
      .orderBy(asc(plansMonthly.monthStart), asc(plansMonthly.metricCode))
      .all();
  }

  async upsertBranches(rows: readonly Branch[]): Promise<number> {
    if (rows.length === 0) return 0;
    this.db
      .insert(branches)
      .values(rows.map((b) => ({ code: b.code, name: b.name })))
      .onConflictDoUpdate({ target: branches.code, set: { name: sql`excluded.name` } })
      .run();
    return rows.length;
  }

  async listBranches(): Promise<Branch[]> {
    return this.db.select().from(branches).orderBy(asc(branches.name), asc(branches.code)).all();
  }

  async getBranch(code: string): Promise<Branch | null> {
    return this.db.select().from(branches).where(eq(branches.code, code)).get() ?? null;
  }

  async upsertMetrics(defs: readonly MetricDefinition[]): Promise<number> {
    if (defs.length === 0) return 0;
    this.db
      .insert(metrics)
      .values(
        defs.map((m) => ({
          code: m.code,
          label: m.label,
          unit: m.unit,
          groupName: m.group,
          isPlan: m.plan,
          isDerived: m.derived,
          aggregation: m.aggregation,
        })),
      )
      .onConflictDoUpdate({
        target: metrics.code,
        set: {
          label: sql`excluded.label`,
          unit: sql`excluded.unit`,
          groupName: sql`excluded.group_name`,
          isPlan: sql`excluded.is_plan`,
          isDerived: sql`excluded.is_derived`,
          aggregation: sql`excluded.aggregation`,
        },
      })
      .run();
    return defs.length;
  }

  async listMetrics(): Promise<MetricDefinition[]> {
    const rows = this.db.select().from(metrics).orderBy(asc(metrics.code)).all();
    return rows.map((r) => ({
      code: r.code,
      label: r.label,
      unit: r.unit,
      group: r.groupName,
      plan: r.isPlan,
      derived: r.isDerived,
      aggregation: toAggregation(r.aggregation),
    }));
  }
}
