import { classifyAttendance } from '../normalize/normalize-records';
import type { EtlRun, EtlRunStatus, VisitInterval } from '../types';

/** Write batches stay well below driver parameter limits. */
export const WRITE_CHUNK = 500;

export function chunk<T>(items: readonly T[], size: number = WRITE_CHUNK): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'string') return Number(value);
  throw new TypeError(`Expected a numeric column, got ${typeof value}`);
}

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  throw new TypeError(`Expected a timestamp column, got ${typeof value}`);
}

export function toIsoString(value: unknown): string {
  return toDate(value).toISOString();
}

export function toBool(value: unknown): boolean {
  return value === true || value === 1 || value === 't' || value === '1';
}

export function toRunStatus(value: unknown): EtlRunStatus {
  if (value === 'running' || value === 'success' || value === 'failed') return value;
  throw new TypeError(`Unknown ETL run status: ${String(value)}`);
}

export interface RawRecordRow {
  branchId: number;
  staffId: number;
  recordId: number;
  startAt: unknown;
  endAt: unknown;
  attendance: number;
  updatedAt: string;
}

export function toVisitInterval(row: RawRecordRow): VisitInterval {
  return {
    branchId: toNumber(row.branchId),
    staffId: toNumber(row.staffId),
    recordId: toNumber(row.recordId),
    start: toDate(row.startAt),
    end: toDate(row.endAt),
    attendanceCode: row.attendance,
    attendanceClass: classifyAttendance(row.attendance),
    updatedAt: row.updatedAt,
  };
}

export interface EtlRunRow {
  runId: string;
  runType: string;
  startedAt: unknown;
  finishedAt: unknown;
  status: unknown;
  progress: string;
  errorLog: string;
}

export function toEtlRun(row: EtlRunRow): EtlRun {
  return {
    runId: row.runId,
    runType: row.runType,
    startedAt: toIsoString(row.startedAt),
    finishedAt: row.finishedAt === null || row.finishedAt === undefined ? null : toIsoString(row.finishedAt),
    status: toRunStatus(row.status),
    progress: row.progress,
    errorLog: row.errorLog,
  };
}
