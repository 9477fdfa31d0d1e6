export * from './types';
export * from './errors';
export { createHourPolicy, DEFAULT_BENCHMARK } from './hour-policy';
export type { HourPolicy } from './hour-policy';
export {
  groupConfigSchema,
  recordsPageSchema,
  heatmapInputSchema,
  loadSummaryInputSchema,
  dailyLoadInputSchema,
  dateWindowSchema,
} from './validation';
export type { GroupConfig, GroupConfigInput } from './validation';

export { normalizeVisitRecords, classifyAttendance, toInteger, FACT_ATTENDANCE_CODES } from './normalize/normalize-records';
export type { NormalizeOptions } from './normalize/normalize-records';
export { buildStaffHourFacts, expandIntervalHours } from './builders/hourly-occupancy';
export type { HourBucket, OccupancyOptions } from './builders/hourly-occupancy';
export { buildGroupHourLoads, loadPercent, round2 } from './builders/group-load';

export type { OccupancyRepository, EtlRunRepository, EtlRunPatch, GroupLoadFilter } from './repositories/types';
export { PgOccupancyRepository, PgEtlRunRepository } from './repositories/pg-occupancy-repository';
export { SqliteOccupancyRepository, SqliteEtlRunRepository } from './repositories/sqlite-occupancy-repository';

export { SchedulingClient, backoffDelayMs } from './upstream/scheduling-client';
export type {
  SchedulingClientOptions,
  SchedulingSource,
  RecordsPage,
  StaffMember,
  Company,
  FetchLike,
} from './upstream/scheduling-client';
export { fetchAllRecords } from './upstream/fetch-records';

export { loadGroupConfig, parseGroupConfig } from './groups/group-config';
export { resolveGroupConfig, normalizeName, findBranchGroups, groupIdsByName, GroupResolver } from './groups/resolve-groups';
export type { GroupResolverOptions } from './groups/resolve-groups';

export { EtlRunTracker, getRun, getLatestRun } from './etl/run-tracker';
export {
  rebuildStaffHourFacts,
  rebuildGroupHourLoads,
  rebuildBranch,
  rebuildFromRawRecords,
  rebuildLockKey,
} from './etl/pipeline';
export type { PipelineContext, BranchRebuildResult } from './etl/pipeline';
export { runEtl, planFullRebuild, planDaily, defaultDailyTarget, EtlJob, EtlJobQueue, DEFAULT_JOB_HISTORY } from './etl/jobs';
export type { BranchWindow, EtlPlan, EtlDeps, BranchScope, EtlJobStatus, EtlJobOutcome } from './etl/jobs';

export { getGroupHeatmap, periodWindow } from './queries/heatmap';
export type { GroupHeatmap, HeatmapDay, HeatmapCell, HeatmapInput, HeatmapPeriod, GrayFlags } from './queries/heatmap';
export { getGroupLoadSummary } from './queries/load-summary';
export type { LoadSummary } from './queries/load-summary';
export { getDailyBenchmarkLoad, createBenchmarkLoadSource } from './queries/daily-benchmark-load';
export type { BenchmarkLoadTarget } from './queries/daily-benchmark-load';
export { listMonthWeeks } from './queries/month-weeks';
