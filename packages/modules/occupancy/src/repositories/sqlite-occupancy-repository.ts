import { and, asc, between, desc, eq, gte, inArray, lt, sql } from 'drizzle-orm';
import { sqliteSchema } from '@hourwise/db';
import type { SqliteDatabase } from '@hourwise/db';
import type {
  BusyStaffHour,
  DateWindow,
  EtlRun,
  GroupHourLoad,
  StaffHourFact,
  VisitInterval,
} from '../types';
import type { EtlRunPatch, EtlRunRepository, GroupLoadFilter, OccupancyRepository } from './types';
import { chunk, toEtlRun, toVisitInterval } from './row-mappers';

const { rawRecords, staffHourBusy, groupHourLoad, etlRuns } = sqliteSchema;

/**
 * Single-file store. better-sqlite3 is synchronous, so transactions here
 * run to completion before the returned promise settles.
 */
export class SqliteOccupancyRepository implements OccupancyRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async upsertRawRecords(records: readonly VisitInterval[]): Promise<number> {
    this.db.transaction((tx) => {
      for (const part of chunk(records)) {
        tx.insert(rawRecords)
          .values(
            part.map((r) => ({
              branchId: r.branchId,
              recordId: r.recordId,
              staffId: r.staffId,
              startAt: r.start.toISOString(),
              endAt: r.end.toISOString(),
              attendance: r.attendanceCode,
              updatedAt: r.updatedAt,
            })),
          )
          .onConflictDoUpdate({
            target: [rawRecords.branchId, rawRecords.recordId],
            set: {
              staffId: sql`excluded.staff_id`,
              startAt: sql`excluded.start_at`,
              endAt: sql`excluded.end_at`,
              attendance: sql`excluded.attendance`,
              updatedAt: sql`excluded.updated_at`,
            },
          })
          .run();
      }
    });
    return records.length;
  }

  async listRawRecords(branchId: number, from: Date, to: Date): Promise<VisitInterval[]> {
    const rows = this.db
      .select()
      .from(rawRecords)
      .where(
        and(
          eq(rawRecords.branchId, branchId),
          gte(rawRecords.startAt, from.toISOString()),
          lt(rawRecords.startAt, to.toISOString()),
        ),
      )
      .orderBy(asc(rawRecords.startAt), asc(rawRecords.recordId))
      .all();
    return rows.map(toVisitInterval);
  }

  async replaceStaffHourFacts(branchId: number, window: DateWindow, facts: readonly StaffHourFact[]): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(staffHourBusy)
        .where(and(eq(staffHourBusy.branchId, branchId), between(staffHourBusy.date, window.from, window.to)))
        .run();
      for (const part of chunk(facts)) {
        tx.insert(staffHourBusy).values(part).run();
      }
    });
  }

  async listBusyStaffHours(
    branchId: number,
    window: DateWindow,
    staffIds?: readonly number[],
  ): Promise<BusyStaffHour[]> {
    if (staffIds && staffIds.length === 0) return [];
    return this.db
      .select({ staffId: staffHourBusy.staffId, date: staffHourBusy.date, hour: staffHourBusy.hour })
      .from(staffHourBusy)
      .where(
        and(
          eq(staffHourBusy.branchId, branchId),
          between(staffHourBusy.date, window.from, window.to),
          eq(staffHourBusy.busy, true),
          staffIds ? inArray(staffHourBusy.staffId, [...staffIds]) : undefined,
        ),
      )
      .orderBy(asc(staffHourBusy.date), asc(staffHourBusy.hour), asc(staffHourBusy.staffId))
      .all();
  }

  async replaceGroupHourLoads(branchId: number, window: DateWindow, rows: readonly GroupHourLoad[]): Promise<void> {
    this.db.transaction((tx) => {
      tx.delete(groupHourLoad)
        .where(and(eq(groupHourLoad.branchId, branchId), between(groupHourLoad.date, window.from, window.to)))
        .run();
      for (const part of chunk(rows)) {
        tx.insert(groupHourLoad).values(part).run();
      }
    });
  }

  async listGroupHourLoads(
    branchId: number,
    groupIds: readonly string[],
    window: DateWindow,
    filter: GroupLoadFilter = {},
  ): Promise<GroupHourLoad[]> {
    if (groupIds.length === 0) return [];
    if (filter.hours && filter.hours.length === 0) return [];
    return this.db
      .select()
      .from(groupHourLoad)
      .where(
        and(
          eq(groupHourLoad.branchId, branchId),
          inArray(groupHourLoad.groupId, [...groupIds]),
          between(groupHourLoad.date, window.from, window.to),
          filter.benchmarkOnly ? eq(groupHourLoad.inBenchmark, true) : undefined,
          filter.hours ? inArray(groupHourLoad.hour, [...filter.hours]) : undefined,
        ),
      )
      .orderBy(asc(groupHourLoad.groupId), asc(groupHourLoad.date), asc(groupHourLoad.hour))
      .all();
  }
}

export class SqliteEtlRunRepository implements EtlRunRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async insertRun(run: EtlRun): Promise<void> {
    this.db.insert(etlRuns).values(run).run();
  }

  async updateRun(runId: string, patch: EtlRunPatch): Promise<void> {
    const set: Partial<typeof etlRuns.$inferInsert> = {};
    if (patch.status !== undefined) set.status = patch.status;
    if (patch.progress !== undefined) set.progress = patch.progress;
    if (patch.finishedAt !== undefined) set.finishedAt = patch.finishedAt;
    const appendError = patch.appendError;
    if (appendError === undefined && Object.keys(set).length === 0) return;
    this.db
      .update(etlRuns)
      .set({
        ...set,
        ...(appendError !== undefined
          ? { errorLog: sql`${sql.identifier('error_log')} || ${`\n${appendError}`}` }
          : {}),
      })
      .where(eq(etlRuns.runId, runId))
      .run();
  }

  async getRun(runId: string): Promise<EtlRun | null> {
    const row = this.db.select().from(etlRuns).where(eq(etlRuns.runId, runId)).get();
    return row ? toEtlRun(row) : null;
  }

  async getLatestRun(runType?: string): Promise<EtlRun | null> {
    const row = this.db
      .select()
      .from(etlRuns)
      .where(runType ? eq(etlRuns.runType, runType) : undefined)
      .orderBy(desc(etlRuns.startedAt), desc(etlRuns.runId))
      .limit(1)
      .get();
    return row ? toEtlRun(row) : null;
  }
}
