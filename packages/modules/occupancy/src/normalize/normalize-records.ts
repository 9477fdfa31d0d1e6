import { parseZonedDateTime } from '@hourwise/shared';
import type { AttendanceClass, VisitInterval } from '../types';

/** Attendance codes meaning the client showed up. */
export const FACT_ATTENDANCE_CODES: ReadonlySet<number> = new Set([1, 2]);

export interface NormalizeOptions {
  timezone: string;
  now?: () => Date;
}

type Payload = Record<string, unknown>;

function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Integer parse that accepts numbers and numeric strings only. */
export function toInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/** First value that is neither null, undefined, false, 0 nor an empty string. */
function firstPresent(...values: unknown[]): unknown {
  return values.find((v) => v !== undefined && v !== null && v !== '' && v !== 0 && v !== false);
}

export function classifyAttendance(code: number): AttendanceClass {
  return FACT_ATTENDANCE_CODES.has(code) ? 'fact' : 'non_fact';
}

function normalizeOne(branchId: number, rec: Payload, options: NormalizeOptions): VisitInterval | null {
  const attendance = toInteger(rec.attendance ?? rec.visit_attendance);
  if (attendance === null || classifyAttendance(attendance) !== 'fact') return null;

  const staffId = toInteger(rec.staff_id);
  const recordId = toInteger(rec.id);
  if (staffId === null || recordId === null) return null;

  const startRaw = firstPresent(rec.datetime, rec.date);
  if (typeof startRaw !== 'string') return null;
  const start = parseZonedDateTime(startRaw, options.timezone);
  if (!start) return null;

  const duration = toInteger(firstPresent(rec.seance_length, rec.length)) ?? 0;
  const end = new Date(start.getTime() + Math.max(0, duration) * 1000);

  const changed = firstPresent(rec.last_change_date, rec.create_date);
  const updatedAt = typeof changed === 'string' ? changed : (options.now?.() ?? new Date()).toISOString();

  return {
    branchId,
    staffId,
    recordId,
    start,
    end,
    attendanceCode: attendance,
    attendanceClass: 'fact',
    updatedAt,
  };
}

/**
 * Shapes raw booking payloads into visit intervals. Records that are not
 * fact visits or lack staff, id or a parseable start are skipped. Output is
 * keyed by record id; a later duplicate replaces an earlier one.
 */
export function normalizeVisitRecords(
  branchId: number,
  payloads: readonly unknown[],
  options: NormalizeOptions,
): VisitInterval[] {
  const byRecord = new Map<number, VisitInterval>();
  for (const payload of payloads) {
    if (!isPayload(payload)) continue;
    const visit = normalizeOne(branchId, payload, options);
    if (visit) byRecord.set(visit.recordId, visit);
  }
  return [...byRecord.values()];
}
