import type {
  BusyStaffHour,
  DateWindow,
  EtlRun,
  EtlRunStatus,
  GroupHourLoad,
  StaffHourFact,
  VisitInterval,
} from '../types';

export interface GroupLoadFilter {
  benchmarkOnly?: boolean;
  hours?: readonly number[];
}

/**
 * Occupancy storage. The two `replace*` methods delete every row of the
 * branch inside the window and insert the given set in one transaction.
 */
export interface OccupancyRepository {
  upsertRawRecords(records: readonly VisitInterval[]): Promise<number>;
  /** Visits whose start lies in [from, to). */
  listRawRecords(branchId: number, from: Date, to: Date): Promise<VisitInterval[]>;
  replaceStaffHourFacts(branchId: number, window: DateWindow, facts: readonly StaffHourFact[]): Promise<void>;
  listBusyStaffHours(branchId: number, window: DateWindow, staffIds?: readonly number[]): Promise<BusyStaffHour[]>;
  replaceGroupHourLoads(branchId: number, window: DateWindow, rows: readonly GroupHourLoad[]): Promise<void>;
  listGroupHourLoads(
    branchId: number,
    groupIds: readonly string[],
    window: DateWindow,
    filter?: GroupLoadFilter,
  ): Promise<GroupHourLoad[]>;
}

export interface EtlRunPatch {
  status?: EtlRunStatus;
  progress?: string;
  /** Appended to the error log after a newline. */
  appendError?: string;
  finishedAt?: string;
}

export interface EtlRunRepository {
  insertRun(run: EtlRun): Promise<void>;
  updateRun(runId: string, patch: EtlRunPatch): Promise<void>;
  getRun(runId: string): Promise<EtlRun | null>;
  getLatestRun(runType?: string): Promise<EtlRun | null>;
}
