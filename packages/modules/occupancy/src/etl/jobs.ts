import { businessDaysAgo, errorMessage, generateUlid } from '@hourwise/shared';
import type { IsoDate } from '@hourwise/shared';
import type { Logger } from '@hourwise/core';
import { EtlCancelledError } from '../errors';
import { normalizeVisitRecords } from '../normalize/normalize-records';
import type { EtlRunRepository } from '../repositories/types';
import type { EtlRun, DateWindow, ResolvedGroupConfig } from '../types';
import { fetchAllRecords } from '../upstream/fetch-records';
import type { SchedulingSource } from '../upstream/scheduling-client';
import { findBranchGroups } from '../groups/resolve-groups';
import { rebuildBranch } from './pipeline';
import type { PipelineContext } from './pipeline';
import { EtlRunTracker } from './run-tracker';

export interface BranchWindow {
  branchId: number;
  window: DateWindow;
}

/** Decides which branches and dates a run covers once groups are resolved. */
export type EtlPlan = (groups: ResolvedGroupConfig) => BranchWindow[];

export interface EtlDeps {
  runs: EtlRunRepository;
  source: SchedulingSource;
  pipeline: PipelineContext;
  resolveGroups: () => Promise<ResolvedGroupConfig>;
  pageSize: number;
  now?: () => Date;
}

export interface BranchScope {
  activeBranchIds: readonly number[];
  branchStartDate?: IsoDate;
}

/**
 * Whole calendar year for every configured branch. A configured branch start
 * date moves the beginning later for active branches (all branches when no
 * active list is set).
 */
export function planFullRebuild(year: number, scope: BranchScope): EtlPlan {
  return (groups) =>
    groups.branches.map(({ branchId }) => {
      let from: IsoDate = `${year}-01-01`;
      const to: IsoDate = `${year}-12-31`;
      const applies = scope.activeBranchIds.length === 0 || scope.activeBranchIds.includes(branchId);
      if (scope.branchStartDate && applies && scope.branchStartDate > from) {
        from = scope.branchStartDate;
      }
      return { branchId, window: { from, to } };
    }).filter(({ window }) => window.from <= window.to);
}

/** One business day for every branch already open on that day. */
export function planDaily(targetDay: IsoDate, scope: BranchScope): EtlPlan {
  return (groups) =>
    groups.branches
      .filter(() => !scope.branchStartDate || targetDay >= scope.branchStartDate)
      .map(({ branchId }) => ({ branchId, window: { from: targetDay, to: targetDay } }));
}

/** Yesterday in the business timezone. */
export function defaultDailyTarget(timezone: string, now: Date = new Date()): IsoDate {
  return businessDaysAgo(now, timezone, 1);
}

/**
 * Runs one tracked ETL pass. Pipeline failures, cancellation included, end
 * in a failed run rather than a rejection; writes already committed for
 * earlier branches stay.
 */
export async function runEtl(
  deps: EtlDeps,
  runType: string,
  plan: EtlPlan,
  shouldCancel: () => boolean = () => false,
): Promise<EtlRun> {
  const log = deps.pipeline.logger;
  const tracker = await EtlRunTracker.start(deps.runs, runType, { now: deps.now, logger: log });
  const runLog = log.child({ runId: tracker.runId, runType });
  const throwIfCancelled = () => {
    if (shouldCancel()) throw new EtlCancelledError();
  };

  try {
    const groups = await deps.resolveGroups();
    for (const { branchId, window } of plan(groups)) {
      throwIfCancelled();
      const payloads = await fetchAllRecords(deps.source, branchId, window.from, window.to, {
        pageSize: deps.pageSize,
        throwIfCancelled,
        onProgress: (text) => tracker.updateProgress(text),
      });
      const intervals = normalizeVisitRecords(branchId, payloads, {
        timezone: deps.pipeline.timezone,
        now: deps.now,
      });
      runLog.info('Records fetched', { branchId, fetched: payloads.length, kept: intervals.length });
      const branchGroups = findBranchGroups(groups, branchId)?.groups ?? [];
      await rebuildBranch({ ...deps.pipeline, logger: runLog }, branchId, window, intervals, branchGroups);
    }
    await tracker.succeed();
  } catch (err) {
    await tracker.fail(err);
  }
  return tracker.snapshot();
}

export type EtlJobStatus = 'queued' | 'running' | 'success' | 'failed';

export interface EtlJobOutcome {
  jobId: string;
  status: 'success' | 'failed';
  run: EtlRun | null;
  error?: string;
}

/**
 * A queued ETL pass. `done` always resolves; a failure to even record the
 * run shows up as a failed outcome with `run: null`.
 */
export class EtlJob {
  readonly jobId = generateUlid();
  private currentStatus: EtlJobStatus = 'queued';
  private cancelled = false;
  private runRecord: EtlRun | null = null;

  constructor(
    readonly runType: string,
    private readonly plan: EtlPlan,
  ) {}

  get status(): EtlJobStatus {
    return this.currentStatus;
  }

  get run(): EtlRun | null {
    return this.runRecord;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Takes effect before the next branch or page. */
  cancel(): void {
    this.cancelled = true;
  }

  async execute(deps: EtlDeps, log: Logger): Promise<EtlJobOutcome> {
    this.currentStatus = 'running';
    const jobLog = log.child({ jobId: this.jobId, runType: this.runType });
    try {
      const run = await runEtl({ ...deps, pipeline: { ...deps.pipeline, logger: jobLog } }, this.runType, this.plan, () => this.cancelled);
      this.runRecord = run;
      this.currentStatus = run.status === 'success' ? 'success' : 'failed';
      return { jobId: this.jobId, status: this.currentStatus, run };
    } catch (err) {
      this.currentStatus = 'failed';
      jobLog.error('ETL job could not record its run', { error: { message: errorMessage(err) } });
      return { jobId: this.jobId, status: 'failed', run: null, error: errorMessage(err) };
    }
  }
}

export const DEFAULT_JOB_HISTORY = 20;

function isFinished(job: EtlJob): boolean {
  return job.status === 'success' || job.status === 'failed';
}

/**
 * Runs jobs one after another in submission order. Only the most recent
 * `historyLimit` finished jobs stay listed; queued and running ones always do.
 */
export class EtlJobQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private readonly jobs = new Map<string, EtlJob>();

  constructor(
    private readonly deps: EtlDeps,
    private readonly log: Logger,
    private readonly historyLimit: number = DEFAULT_JOB_HISTORY,
  ) {}

  submit(job: EtlJob): { job: EtlJob; done: Promise<EtlJobOutcome> } {
    this.jobs.set(job.jobId, job);
    const done = this.tail
      .then(() => job.execute(this.deps, this.log))
      .then((outcome) => {
        this.pruneFinished();
        return outcome;
      });
    this.tail = done;
    return { job, done };
  }

  private pruneFinished(): void {
    const finished = [...this.jobs.values()].filter(isFinished);
    for (const job of finished.slice(0, Math.max(0, finished.length - this.historyLimit))) {
      this.jobs.delete(job.jobId);
    }
  }

  get(jobId: string): EtlJob | undefined {
    return this.jobs.get(jobId);
  }

  list(): EtlJob[] {
    return [...this.jobs.values()];
  }
}
