import { NotFoundError, errorMessage, generateUlid } from '@hourwise/shared';
import { silentLogger } from '@hourwise/core/observability';
import type { Logger } from '@hourwise/core/observability';
import { EtlRunTerminalError } from '../errors';
import type { EtlRunPatch, EtlRunRepository } from '../repositories/types';
import { ETL_TERMINAL_STATUSES } from '../types';
import type { EtlRun } from '../types';

export interface RunTrackerOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Lifecycle of a single ETL run row: running → success | failed.
 * Once terminal, every further mutation throws.
 */
export class EtlRunTracker {
  private state: EtlRun;

  private constructor(
    private readonly repo: EtlRunRepository,
    initial: EtlRun,
    private readonly now: () => Date,
    private readonly log: Logger,
  ) {
    this.state = initial;
  }

  static async start(repo: EtlRunRepository, runType: string, options: RunTrackerOptions = {}): Promise<EtlRunTracker> {
    const now = options.now ?? (() => new Date());
    const run: EtlRun = {
      runId: generateUlid(now().getTime()),
      runType,
      startedAt: now().toISOString(),
      finishedAt: null,
      status: 'running',
      progress: '0%',
      errorLog: '',
    };
    await repo.insertRun(run);
    const log = (options.logger ?? silentLogger).child({ runId: run.runId, runType });
    log.info('ETL run started');
    return new EtlRunTracker(repo, run, now, log);
  }

  get runId(): string {
    return this.state.runId;
  }

  get status(): EtlRun['status'] {
    return this.state.status;
  }

  snapshot(): EtlRun {
    return { ...this.state };
  }

  private async apply(patch: EtlRunPatch): Promise<void> {
    if (ETL_TERMINAL_STATUSES.includes(this.state.status)) {
      throw new EtlRunTerminalError(this.state.runId, this.state.status);
    }
    await this.repo.updateRun(this.state.runId, patch);
    const errorLog = patch.appendError === undefined ? this.state.errorLog : `${this.state.errorLog}\n${patch.appendError}`;
    this.state = {
      ...this.state,
      status: patch.status ?? this.state.status,
      progress: patch.progress ?? this.state.progress,
      finishedAt: patch.finishedAt ?? this.state.finishedAt,
      errorLog,
    };
  }

  updateProgress(text: string): Promise<void> {
    return this.apply({ progress: text });
  }

  appendError(text: string): Promise<void> {
    return this.apply({ appendError: text });
  }

  async succeed(): Promise<void> {
    await this.apply({ status: 'success', progress: '100%', finishedAt: this.now().toISOString() });
    this.log.info('ETL run succeeded', { durationMs: this.elapsedMs() });
  }

  async fail(err: unknown): Promise<void> {
    const message = errorMessage(err);
    await this.apply({ status: 'failed', appendError: message, finishedAt: this.now().toISOString() });
    this.log.error('ETL run failed', { durationMs: this.elapsedMs(), error: { message } });
  }

  private elapsedMs(): number {
    return this.now().getTime() - Date.parse(this.state.startedAt);
  }
}

export async function getRun(repo: EtlRunRepository, runId: string): Promise<EtlRun> {
  const run = await repo.getRun(runId);
  if (!run) throw new NotFoundError('ETL run', runId);
  return run;
}

export function getLatestRun(repo: EtlRunRepository, runType?: string): Promise<EtlRun | null> {
  return repo.getLatestRun(runType);
}
