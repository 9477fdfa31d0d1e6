export * from './types';
export {
  defaultBranchCodeRules,
  defaultCatalog,
  parseBranchCodeRules,
  parseMetricCatalog,
} from './catalog';
export type { BranchCodeRules, CatalogMetric, DriverSource, MetricCatalog, MetricUnit, MonthReportRow } from './catalog';
export { isIgnoredBranchCode, normalizeBranchCode } from './branch-codes';
export * from './periods';
export * from './derived';
export * from './comparison';
export { LOAD_METRIC, fetchSeries, resolveBranch } from './context';
export type { FinancialContext } from './context';

export type { FinancialRepository } from './repositories/types';
export { PgFinancialRepository } from './repositories/pg-financial-repository';
export { SqliteFinancialRepository } from './repositories/sqlite-financial-repository';
export type { SqliteFinancialRepositoryOptions } from './repositories/sqlite-financial-repository';

export { upsertDailyFacts, upsertDailyFactsSchema } from './commands/upsert-daily-facts';
export type { UpsertDailyFactsInput, UpsertDailyFactsResult } from './commands/upsert-daily-facts';
export { upsertPlan, upsertPlanSchema } from './commands/upsert-plan';
export type { UpsertPlanInput } from './commands/upsert-plan';
export { upsertBranches, upsertBranchesSchema } from './commands/upsert-branches';
export type { UpsertBranchesInput } from './commands/upsert-branches';
export { syncMetricCatalog } from './commands/sync-metric-catalog';
export { mergeBranchAliases } from './commands/merge-branch-aliases';
export type { BranchMerge } from './commands/merge-branch-aliases';

export { buildMonthReport, monthReportInputSchema } from './queries/month-report';
export type {
  MonthReport,
  MonthReportColumn,
  MonthReportDay,
  MonthReportInput,
  MonthReportMetric,
} from './queries/month-report';
export { buildRawMonth, rawMonthInputSchema } from './queries/raw-month';
export type { RawMonth, RawMonthInput, RawMonthMetric } from './queries/raw-month';
export { buildOverview, overviewInputSchema, MAX_ALERTS, TRAILING_WEEKS } from './queries/overview';
export type { Overview, OverviewAlert, OverviewCheck, OverviewInput } from './queries/overview';
export { buildYearSummary, yearRange, yearSummaryInputSchema } from './queries/year-summary';
export type { YearSummary, YearSummaryInput, YearSummaryMetric } from './queries/year-summary';
export { listBranches } from './queries/list-branches';
export { listMonths, listMonthsInputSchema } from './queries/list-months';
export type { ListMonthsInput } from './queries/list-months';
