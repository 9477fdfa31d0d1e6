import { sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { Database } from '@hourwise/db';
import type {
  Branch,
  DailyMetricFact,
  DateWindow,
  MetricDefinition,
  MonthlyPlan,
  MonthlyTotal,
} from '../types';
import type { FinancialRepository } from './types';
import { chunk, toAggregation, toBool, toNumber } from './row-mappers';

type PgDb = Pick<Database, 'execute' | 'transaction'>;

function list(values: readonly string[]): SQL {
  return sql.join(
    values.map((v) => sql`${v}`),
    sql`, `,
  );
}

type FactRecord = {
  branch_code: string;
  metric_code: string;
  date: string;
  value: number | string;
  source: string;
};

type BranchRecord = { code: string; name: string };

type PlanRecord = { branch_code: string; metric_code: string; month_start: string; value: number | string };

export class PgFinancialRepository implements FinancialRepository {
  constructor(private readonly db: PgDb) {}

  async upsertDailyFacts(facts: readonly DailyMetricFact[]): Promise<number> {
    if (facts.length === 0) return 0;
    await this.db.transaction(async (tx) => {
      for (const part of chunk(facts)) {
        const values = sql.join(
          part.map((f) => sql`(${f.branchCode}, ${f.metricCode}, ${f.date}, ${f.value}, ${f.source}, now())`),
          sql`, `,
        );
        await tx.execute(sql`
          INSERT INTO manual_sheet_daily (branch_code, metric_code, date, value, source, updated_at)
          VALUES ${values}
          ON CONFLICT (branch_code, metric_code, date) DO UPDATE SET
            value = EXCLUDED.value,
            source = EXCLUDED.source,
            updated_at = EXCLUDED.updated_at
        `);
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
    const codes = metricCodes ? sql`AND metric_code IN (${list(metricCodes)})` : sql``;
    const rows = await this.db.execute<FactRecord>(sql`
      SELECT branch_code, metric_code, date::text AS date, value, source
      FROM manual_sheet_daily
      WHERE branch_code = ${branchCode}
        AND date BETWEEN ${window.from} AND ${window.to}
        ${codes}
      ORDER BY date, metric_code
    `);
    return Array.from(rows).map((r) => ({
      branchCode: r.branch_code,
      metricCode: r.metric_code,
      date: r.date,
      value: toNumber(r.value),
      source: r.source,
    }));
  }

  async monthlyFactTotals(branchCode: string, metricCodes: readonly string[]): Promise<MonthlyTotal[]> {
    if (metricCodes.length === 0) return [];
    const rows = await this.db.execute<{ metric_code: string; month: string; total: number | string }>(sql`
      SELECT metric_code, to_char(date, 'YYYY-MM') AS month, SUM(value) AS total
      FROM manual_sheet_daily
      WHERE branch_code = ${branchCode}
        AND metric_code IN (${list(metricCodes)})
      GROUP BY metric_code, month
      ORDER BY month, metric_code
    `);
    return Array.from(rows).map((r) => ({ metricCode: r.metric_code, month: r.month, value: toNumber(r.total) }));
  }

  async listFactMonths(branchCode: string): Promise<string[]> {
    const rows = await this.db.execute<{ month: string }>(sql`
      SELECT DISTINCT to_char(date, 'YYYY-MM') AS month
      FROM manual_sheet_daily
      WHERE branch_code = ${branchCode}
      ORDER BY month DESC
    `);
    return Array.from(rows).map((r) => r.month);
  }

  async listFactBranchCodes(): Promise<string[]> {
    const rows = await this.db.execute<{ code: string }>(sql`
      SELECT DISTINCT branch_code AS code FROM manual_sheet_daily ORDER BY code
    `);
    return Array.from(rows).map((r) => r.code);
  }

  async mergeBranchCode(alias: string, canonical: string): Promise<number> {
    if (alias === canonical) return 0;
    return this.db.transaction(async (tx) => {
      const counted = await tx.execute<{ n: number | string }>(sql`
        SELECT count(*) AS n FROM manual_sheet_daily WHERE branch_code = ${alias}
      `);
      const moved = toNumber(Array.from(counted)[0]?.n ?? 0);
      if (moved === 0) return 0;
      await tx.execute(sql`
        INSERT INTO manual_sheet_daily (branch_code, metric_code, date, value, source, updated_at)
        SELECT ${canonical}, metric_code, date, value, source, updated_at
        FROM manual_sheet_daily
        WHERE branch_code = ${alias}
        ON CONFLICT (branch_code, metric_code, date) DO UPDATE SET
          value = EXCLUDED.value,
          source = EXCLUDED.source,
          updated_at = EXCLUDED.updated_at
      `);
      await tx.execute(sql`DELETE FROM manual_sheet_daily WHERE branch_code = ${alias}`);
      return moved;
    });
  }

  async upsertPlan(plan: MonthlyPlan): Promise<void> {
    await this.db.execute(sql`
      INSERT INTO plans_monthly (branch_code, metric_code, month_start, value, updated_at)
      VALUES (${plan.branchCode}, ${plan.metricCode}, ${plan.monthStart}, ${plan.value}, now())
      ON CONFLICT (branch_code, metric_code, month_start) DO UPDATE SET
        value = EXCLUDED.value,
        updated_at = EXCLUDED.updated_at
    `);
  }

  async listPlans(branchCode: string, metricCodes: readonly string[], monthStart?: string): Promise<MonthlyPlan[]> {
    if (metricCodes.length === 0) return [];
    const month = monthStart ? sql`AND month_start = ${monthStart}` : sql``;
    const rows = await this.db.execute<PlanRecord>(sql`
      SELECT branch_code, metric_code, month_start::text AS month_start, value
      FROM plans_monthly
      WHERE branch_code = ${branchCode}
        AND metric_code IN (${list(metricCodes)})
        ${month}
      ORDER BY month_start, metric_code
    `);
    return Array.from(rows).map((r) => ({
      branchCode: r.branch_code,
      metricCode: r.metric_code,
      monthStart: r.month_start,
      value: toNumber(r.value),
    }));
  }

  async upsertBranches(branches: readonly Branch[]): Promise<number> {
    if (branches.length === 0) return 0;
    const values = sql.join(
      branches.map((b) => sql`(${b.code}, ${b.name})`),
      sql`, `,
    );
    await this.db.execute(sql`
      INSERT INTO branches (code, name) VALUES ${values}
      ON CONFLICT (code) DO UPDATE SET name = EXCLUDED.name
    `);
    return branches.length;
  }

  async listBranches(): Promise<Branch[]> {
    const rows = await this.db.execute<BranchRecord>(sql`SELECT code, name FROM branches ORDER BY name, code`);
    return Array.from(rows).map((r) => ({ code: r.code, name: r.name }));
  }

  async getBranch(code: string): Promise<Branch | null> {
    const rows = await this.db.execute<BranchRecord>(sql`SELECT code, name FROM branches WHERE code = ${code}`);
    const row = Array.from(rows)[0];
    return row ? { code: row.code, name: row.name } : null;
  }

  async upsertMetrics(metrics: readonly MetricDefinition[]): Promise<number> {
    if (metrics.length === 0) return 0;
    const values = sql.join(
      metrics.map(
        (m) => sql`(${m.code}, ${m.label}, ${m.unit}, ${m.group}, ${m.plan}, ${m.derived}, ${m.aggregation})`,
      ),
      sql`, `,
    );
    await this.db.execute(sql`
      INSERT INTO metrics (code, label, unit, group_name, is_plan, is_derived, aggregation)
      VALUES ${values}
      ON CONFLICT (code) DO UPDATE SET
        label = EXCLUDED.label,
        unit = EXCLUDED.unit,
        group_name = EXCLUDED.group_name,
        is_plan = EXCLUDED.is_plan,
        is_derived = EXCLUDED.is_derived,
        aggregation = EXCLUDED.aggregation
    `);
    return metrics.length;
  }

  async listMetrics(): Promise<MetricDefinition[]> {
    const rows = await this.db.execute<{
      code: string;
      label: string;
      unit: string | null;
      group_name: string | null;
      is_plan: boolean;
      is_derived: boolean;
      aggregation: string | null;
    }>(sql`
      SELECT code, label, unit, group_name, is_plan, is_derived, aggregation
      FROM metrics
      ORDER BY code
    `);
    return Array.from(rows).map((r) => ({
      code: r.code,
      label: r.label,
      unit: r.unit,
      group: r.group_name,
      plan: toBool(r.is_plan),
      derived: toBool(r.is_derived),
      aggregation: toAggregation(r.aggregation),
    }));
  }
}
