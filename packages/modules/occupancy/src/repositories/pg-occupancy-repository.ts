import { sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import type { Database } from '@hourwise/db';
import type {
  BusyStaffHour,
  DateWindow,
  EtlRun,
  GroupHourLoad,
  StaffHourFact,
  VisitInterval,
} from '../types';
import type { EtlRunPatch, EtlRunRepository, GroupLoadFilter, OccupancyRepository } from './types';
import { chunk, toBool, toEtlRun, toNumber, toVisitInterval } from './row-mappers';

type Executor = Pick<Database, 'execute'>;
type PgDb = Pick<Database, 'execute' | 'transaction'>;

function list(values: readonly (string | number)[]): SQL {
  return sql.join(
    values.map((v) => sql`${v}`),
    sql`, `,
  );
}

async function insertStaffHourFacts(tx: Executor, facts: readonly StaffHourFact[]): Promise<void> {
  for (const part of chunk(facts)) {
    const values = sql.join(
      part.map(
        (f) => sql`(${f.branchId}, ${f.staffId}, ${f.date}, ${f.hour}, ${f.busy}, ${f.inBenchmark}, ${f.inGray})`,
      ),
      sql`, `,
    );
    await tx.execute(sql`
      INSERT INTO staff_hour_busy (branch_id, staff_id, date, hour, busy, in_benchmark, in_gray)
      VALUES ${values}
    `);
  }
}

async function insertGroupHourLoads(tx: Executor, rows: readonly GroupHourLoad[]): Promise<void> {
  for (const part of chunk(rows)) {
    const values = sql.join(
      part.map(
        (r) =>
          sql`(${r.branchId}, ${r.groupId}, ${r.date}, ${r.dow}, ${r.hour}, ${r.busyCount}, ${r.staffTotal}, ${r.loadPct}, ${r.inBenchmark})`,
      ),
      sql`, `,
    );
    await tx.execute(sql`
      INSERT INTO group_hour_load
        (branch_id, group_id, date, dow, hour, busy_count, staff_total, load_pct, in_benchmark)
      VALUES ${values}
    `);
  }
}

export class PgOccupancyRepository implements OccupancyRepository {
  constructor(private readonly db: PgDb) {}

  async upsertRawRecords(records: readonly VisitInterval[]): Promise<number> {
    for (const part of chunk(records)) {
      const values = sql.join(
        part.map(
          (r) =>
            sql`(${r.branchId}, ${r.recordId}, ${r.staffId}, ${r.start.toISOString()}, ${r.end.toISOString()}, ${r.attendanceCode}, ${r.updatedAt})`,
        ),
        sql`, `,
      );
      await this.db.execute(sql`
        INSERT INTO raw_records (branch_id, record_id, staff_id, start_at, end_at, attendance, updated_at)
        VALUES ${values}
        ON CONFLICT (branch_id, record_id) DO UPDATE SET
          staff_id = EXCLUDED.staff_id,
          start_at = EXCLUDED.start_at,
          end_at = EXCLUDED.end_at,
          attendance = EXCLUDED.attendance,
          updated_at = EXCLUDED.updated_at
      `);
    }
    return records.length;
  }

  async listRawRecords(branchId: number, from: Date, to: Date): Promise<VisitInterval[]> {
    const rows = await this.db.execute<{
      branch_id: number | string;
      record_id: number | string;
      staff_id: number | string;
      start_at: Date | string;
      end_at: Date | string;
      attendance: number;
      updated_at: string;
    }>(sql`
      SELECT branch_id, record_id, staff_id, start_at, end_at, attendance, updated_at
      FROM raw_records
      WHERE branch_id = ${branchId}
        AND start_at >= ${from.toISOString()}
        AND start_at < ${to.toISOString()}
      ORDER BY start_at, record_id
    `);
    return Array.from(rows).map((r) =>
      toVisitInterval({
        branchId: toNumber(r.branch_id),
        recordId: toNumber(r.record_id),
        staffId: toNumber(r.staff_id),
        startAt: r.start_at,
        endAt: r.end_at,
        attendance: r.attendance,
        updatedAt: r.updated_at,
      }),
    );
  }

  async replaceStaffHourFacts(branchId: number, window: DateWindow, facts: readonly StaffHourFact[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.execute(sql`
        DELETE FROM staff_hour_busy
        WHERE branch_id = ${branchId} AND date BETWEEN ${window.from} AND ${window.to}
      `);
      await insertStaffHourFacts(tx, facts);
    });
  }

  async listBusyStaffHours(
    branchId: number,
    window: DateWindow,
    staffIds?: readonly number[],
  ): Promise<BusyStaffHour[]> {
    if (staffIds && staffIds.length === 0) return [];
    const staffFilter = staffIds ? sql`AND staff_id IN (${list(staffIds)})` : sql``;
    const rows = await this.db.execute<{ staff_id: number | string; date: string; hour: number }>(sql`
      SELECT staff_id, date::text AS date, hour
      FROM staff_hour_busy
      WHERE branch_id = ${branchId}
        AND date BETWEEN ${window.from} AND ${window.to}
        AND busy = TRUE
        ${staffFilter}
      ORDER BY date, hour, staff_id
    `);
    return Array.from(rows).map((r) => ({ staffId: toNumber(r.staff_id), date: r.date, hour: toNumber(r.hour) }));
  }

  async replaceGroupHourLoads(branchId: number, window: DateWindow, rows: readonly GroupHourLoad[]): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.execute(sql`
        DELETE FROM group_hour_load
        WHERE branch_id = ${branchId} AND date BETWEEN ${window.from} AND ${window.to}
      `);
      await insertGroupHourLoads(tx, rows);
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
    const benchmark = filter.benchmarkOnly ? sql`AND in_benchmark = TRUE` : sql``;
    const hours = filter.hours ? sql`AND hour IN (${list(filter.hours)})` : sql``;
    const rows = await this.db.execute<{
      group_id: string;
      date: string;
      dow: number;
      hour: number;
      busy_count: number;
      staff_total: number;
      load_pct: number | string;
      in_benchmark: boolean;
    }>(sql`
      SELECT group_id, date::text AS date, dow, hour, busy_count, staff_total, load_pct, in_benchmark
      FROM group_hour_load
      WHERE branch_id = ${branchId}
        AND group_id IN (${list(groupIds)})
        AND date BETWEEN ${window.from} AND ${window.to}
        ${benchmark}
        ${hours}
      ORDER BY group_id, date, hour
    `);
    return Array.from(rows).map((r) => ({
      branchId,
      groupId: r.group_id,
      date: r.date,
      dow: toNumber(r.dow),
      hour: toNumber(r.hour),
      busyCount: toNumber(r.busy_count),
      staffTotal: toNumber(r.staff_total),
      loadPct: toNumber(r.load_pct),
      inBenchmark: toBool(r.in_benchmark),
    }));
  }
}

type EtlRunRecord = {
  run_id: string;
  run_type: string;
  started_at: Date | string;
  finished_at: Date | string | null;
  status: string;
  progress: string;
  error_log: string;
};

function fromRecord(r: EtlRunRecord): EtlRun {
  return toEtlRun({
    runId: r.run_id,
    runType: r.run_type,
    startedAt: r.started_at,
    finishedAt: r.finished_at,
    status: r.status,
    progress: r.progress,
    errorLog: r.error_log,
  });
}

export class PgEtlRunRepository implements EtlRunRepository {
  constructor(private readonly db: Executor) {}

  async insertRun(run: EtlRun): Promise<void> {
    await this.db.execute(sql`
      INSERT INTO etl_runs (run_id, run_type, started_at, finished_at, status, progress, error_log)
      VALUES (${run.runId}, ${run.runType}, ${run.startedAt}, ${run.finishedAt}, ${run.status}, ${run.progress}, ${run.errorLog})
    `);
  }

  async updateRun(runId: string, patch: EtlRunPatch): Promise<void> {
    const sets: SQL[] = [];
    if (patch.status !== undefined) sets.push(sql`status = ${patch.status}`);
    if (patch.progress !== undefined) sets.push(sql`progress = ${patch.progress}`);
    if (patch.appendError !== undefined) sets.push(sql`error_log = error_log || ${`\n${patch.appendError}`}`);
    if (patch.finishedAt !== undefined) sets.push(sql`finished_at = ${patch.finishedAt}`);
    if (sets.length === 0) return;
    await this.db.execute(sql`UPDATE etl_runs SET ${sql.join(sets, sql`, `)} WHERE run_id = ${runId}`);
  }

  async getRun(runId: string): Promise<EtlRun | null> {
    const rows = await this.db.execute<EtlRunRecord>(sql`
      SELECT run_id, run_type, started_at, finished_at, status, progress, error_log
      FROM etl_runs
      WHERE run_id = ${runId}
    `);
    const row = Array.from(rows)[0];
    return row ? fromRecord(row) : null;
  }

  async getLatestRun(runType?: string): Promise<EtlRun | null> {
    const filter = runType ? sql`WHERE run_type = ${runType}` : sql``;
    const rows = await this.db.execute<EtlRunRecord>(sql`
      SELECT run_id, run_type, started_at, finished_at, status, progress, error_log
      FROM etl_runs
      ${filter}
      ORDER BY started_at DESC, run_id DESC
      LIMIT 1
    `);
    const row = Array.from(rows)[0];
    return row ? fromRecord(row) : null;
  }
}
