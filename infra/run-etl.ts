/**
 * Occupancy ETL entry point.
 *
 * Usage:
 *   tsx infra/run-etl.ts full --year 2025
 *   tsx infra/run-etl.ts daily [--date 2025-01-15]
 *
 * The store comes from DATABASE_URL (Postgres) or SQLITE_PATH.
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';

config({ path: fileURLToPath(new URL('../.env.local', import.meta.url)) });
config({ path: fileURLToPath(new URL('../.env', import.meta.url)) });

import { z } from 'zod';
import { ConfigurationError, errorMessage, isoDateSchema } from '@hourwise/shared';
import { KeyedMutex, MemoryTtlCache, PgRebuildLock, createLogger, loadConfig, setLogLevel } from '@hourwise/core';
import type { AppConfig, Logger, RebuildLock } from '@hourwise/core';
import { applyPgSchema, applySqliteSchema, createPgDatabase, createSqliteDatabase } from '@hourwise/db';
import {
  EtlJob,
  EtlJobQueue,
  GroupResolver,
  PgEtlRunRepository,
  PgOccupancyRepository,
  SchedulingClient,
  SqliteEtlRunRepository,
  SqliteOccupancyRepository,
  createHourPolicy,
  defaultDailyTarget,
  loadGroupConfig,
  planDaily,
  planFullRebuild,
} from '@hourwise/module-occupancy';
import type { EtlPlan, EtlRunRepository, OccupancyRepository, ResolvedGroupConfig } from '@hourwise/module-occupancy';

const argsSchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('full'), year: z.coerce.number().int().min(2000).max(2100) }),
  z.object({ mode: z.literal('daily'), date: isoDateSchema.optional() }),
]);

type EtlArgs = z.infer<typeof argsSchema>;

function parseArgs(argv: readonly string[]): EtlArgs {
  const [mode, ...rest] = argv;
  const flags: Record<string, string> = {};
  for (let i = 0; i < rest.length; i += 2) {
    const name = rest[i];
    const value = rest[i + 1];
    if (!name?.startsWith('--') || value === undefined) {
      throw new ConfigurationError(`Unexpected argument: ${name ?? ''}`);
    }
    flags[name.slice(2)] = value;
  }
  const parsed = argsSchema.safeParse({ mode, ...flags });
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Usage: run-etl full --year YYYY | daily [--date YYYY-MM-DD] (${details})`);
  }
  return parsed.data;
}

interface Store {
  occupancy: OccupancyRepository;
  runs: EtlRunRepository;
  lock: RebuildLock;
  close: () => Promise<void>;
}

async function openStore(appConfig: AppConfig, log: Logger): Promise<Store> {
  if (appConfig.database.kind === 'postgres') {
    const handle = createPgDatabase(appConfig.database.url, {
      onNotice: (text) => log.debug('Postgres notice', { notice: text }),
    });
    await applyPgSchema(handle.db);
    return {
      occupancy: new PgOccupancyRepository(handle.db),
      runs: new PgEtlRunRepository(handle.db),
      lock: new PgRebuildLock(handle.db, { logger: log }),
      close: () => handle.close(),
    };
  }
  const handle = createSqliteDatabase(appConfig.database.path);
  applySqliteSchema(handle.db);
  return {
    occupancy: new SqliteOccupancyRepository(handle.db),
    runs: new SqliteEtlRunRepository(handle.db),
    lock: new KeyedMutex(),
    close: async () => handle.close(),
  };
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const appConfig = loadConfig();
  setLogLevel(appConfig.logLevel);
  const log = createLogger({ component: 'etl' });

  const partnerToken = appConfig.scheduling.partnerToken;
  if (!partnerToken) {
    throw new ConfigurationError('SCHEDULING_PARTNER_TOKEN is required to run the ETL');
  }

  const store = await openStore(appConfig, log);
  const source = new SchedulingClient({
    baseUrl: appConfig.scheduling.baseUrl,
    partnerToken,
    userToken: appConfig.scheduling.userToken,
    timeoutMs: appConfig.scheduling.timeoutMs,
    retries: appConfig.scheduling.retries,
    logger: log,
  });
  const resolver = new GroupResolver({
    loadConfig: () => loadGroupConfig(appConfig.groupConfigPath),
    source,
    cache: new MemoryTtlCache<ResolvedGroupConfig>(appConfig.groupCacheTtlMs),
    logger: log,
  });

  const queue = new EtlJobQueue(
    {
      runs: store.runs,
      source,
      pipeline: {
        occupancy: store.occupancy,
        timezone: appConfig.timezone,
        hourPolicy: createHourPolicy(appConfig.benchmark),
        lock: store.lock,
        logger: log,
      },
      resolveGroups: () => resolver.resolve(),
      pageSize: appConfig.scheduling.pageSize,
    },
    log,
  );

  const scope = { activeBranchIds: appConfig.activeBranchIds, branchStartDate: appConfig.branchStartDate };
  let plan: EtlPlan;
  if (args.mode === 'full') {
    plan = planFullRebuild(args.year, scope);
  } else {
    plan = planDaily(args.date ?? defaultDailyTarget(appConfig.timezone), scope);
  }

  const { job, done } = queue.submit(new EtlJob(args.mode, plan));
  const cancel = (signal: string) => {
    log.warn(`Cancelling ETL job (${signal})`, { jobId: job.jobId });
    job.cancel();
  };
  process.once('SIGINT', () => cancel('SIGINT'));
  process.once('SIGTERM', () => cancel('SIGTERM'));

  try {
    const outcome = await done;
    log.info('ETL finished', {
      jobId: outcome.jobId,
      status: outcome.status,
      runId: outcome.run?.runId,
      progress: outcome.run?.progress,
    });
    if (outcome.status === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  createLogger({ component: 'etl' }).error('ETL failed to start', { error: { message: errorMessage(err) } });
  process.exit(1);
});
