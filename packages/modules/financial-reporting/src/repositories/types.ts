import type {
  Branch,
  DailyMetricFact,
  DateWindow,
  MetricDefinition,
  MonthlyPlan,
  MonthlyTotal,
} from '../types';

/**
 * Storage for manual daily figures, plans and reference tables. Every write
 * is an upsert on the natural key; the last write wins.
 */
export interface FinancialRepository {
  upsertDailyFacts(facts: readonly DailyMetricFact[]): Promise<number>;
  /** Facts with date in [from, to], optionally limited to the given codes. */
  listDailyFacts(branchCode: string, window: DateWindow, metricCodes?: readonly string[]): Promise<DailyMetricFact[]>;
  /** Per-month SUM of daily values. */
  monthlyFactTotals(branchCode: string, metricCodes: readonly string[]): Promise<MonthlyTotal[]>;
  /** Distinct `YYYY-MM` months with facts, newest first. */
  listFactMonths(branchCode: string): Promise<string[]>;
  listFactBranchCodes(): Promise<string[]>;
  /** Moves every fact of `alias` onto `canonical`; returns the rows moved. */
  mergeBranchCode(alias: string, canonical: string): Promise<number>;

  upsertPlan(plan: MonthlyPlan): Promise<void>;
  /** Plans for the codes; all months unless `monthStart` is given. */
  listPlans(branchCode: string, metricCodes: readonly string[], monthStart?: string): Promise<MonthlyPlan[]>;

  upsertBranches(branches: readonly Branch[]): Promise<number>;
  listBranches(): Promise<Branch[]>;
  getBranch(code: string): Promise<Branch | null>;

  upsertMetrics(metrics: readonly MetricDefinition[]): Promise<number>;
  listMetrics(): Promise<MetricDefinition[]>;
}
