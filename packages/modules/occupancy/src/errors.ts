import { AppError } from '@hourwise/shared';
import type { EtlRunStatus } from './types';

export interface UpstreamErrorDetails {
  status?: number;
  attempts?: number;
  retryable: boolean;
  path?: string;
}

export class UpstreamApiError extends AppError {
  readonly status?: number;
  readonly attempts?: number;
  readonly retryable: boolean;

  constructor(message: string, info: UpstreamErrorDetails) {
    super('UPSTREAM_ERROR', message, 502);
    this.name = 'UpstreamApiError';
    this.status = info.status;
    this.attempts = info.attempts;
    this.retryable = info.retryable;
  }
}

export class EtlRunTerminalError extends AppError {
  constructor(runId: string, status: EtlRunStatus) {
    super('ETL_RUN_TERMINAL', `ETL run ${runId} is already ${status}`, 409);
    this.name = 'EtlRunTerminalError';
  }
}

export class EtlCancelledError extends AppError {
  constructor() {
    super('ETL_CANCELLED', 'cancelled', 409);
    this.name = 'EtlCancelledError';
  }
}
