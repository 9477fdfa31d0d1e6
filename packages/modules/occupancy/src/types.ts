import type { IsoDate } from '@hourwise/shared';

export type AttendanceClass = 'fact' | 'non_fact';

/** A booking the client actually attended, in canonical form. */
export interface VisitInterval {
  branchId: number;
  staffId: number;
  recordId: number;
  start: Date;
  end: Date;
  attendanceCode: number;
  attendanceClass: AttendanceClass;
  updatedAt: string;
}

/** Inclusive range of local business dates. */
export interface DateWindow {
  from: IsoDate;
  to: IsoDate;
}

export interface StaffHourFact {
  branchId: number;
  staffId: number;
  date: IsoDate;
  hour: number;
  busy: boolean;
  inBenchmark: boolean;
  inGray: boolean;
}

export interface BusyStaffHour {
  staffId: number;
  date: IsoDate;
  hour: number;
}

export interface GroupHourLoad {
  branchId: number;
  groupId: string;
  date: IsoDate;
  dow: number;
  hour: number;
  busyCount: number;
  staffTotal: number;
  loadPct: number;
  inBenchmark: boolean;
}

export interface GroupDefinition {
  groupId: string;
  name: string;
  staffIds: readonly number[];
}

export interface BranchGroups {
  branchId: number;
  displayName: string;
  groups: readonly GroupDefinition[];
}

export interface ResolvedGroupConfig {
  branches: readonly BranchGroups[];
}

export type EtlRunStatus = 'running' | 'success' | 'failed';

export interface EtlRun {
  runId: string;
  runType: string;
  startedAt: string;
  finishedAt: string | null;
  status: EtlRunStatus;
  progress: string;
  errorLog: string;
}

export const ETL_TERMINAL_STATUSES: readonly EtlRunStatus[] = ['success', 'failed'];
