import { drizzle as drizzlePg } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { drizzle as drizzleSqlite } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import postgres from 'postgres';
import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import * as schema from './schema';
import * as sqliteSchema from './schema/sqlite';

export type Database = PostgresJsDatabase<typeof schema>;
export type SqliteDatabase = BetterSQLite3Database<typeof sqliteSchema>;

export interface PgConnectionOptions {
  /** Pool size. Rebuilds use one connection; reports may run a few queries in parallel. */
  max?: number;
  prepare?: boolean;
  onNotice?: (message: string) => void;
}

export interface PgHandle {
  db: Database;
  close(): Promise<void>;
}

export interface SqliteHandle {
  db: SqliteDatabase;
  close(): void;
}

export function createPgDatabase(connectionString: string, options: PgConnectionOptions = {}): PgHandle {
  const client = postgres(connectionString, {
    max: options.max ?? 4,
    prepare: options.prepare ?? false,
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: 10,
    onnotice: (notice) => {
      options.onNotice?.(`${notice.severity}: ${notice.message}`);
    },
  });
  return {
    db: drizzlePg(client, { schema }),
    close: () => client.end(),
  };
}

/** Opens (and creates, if needed) a single-file store. `:memory:` is accepted for tests. */
export function createSqliteDatabase(path: string): SqliteHandle {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }
  const client = new BetterSqlite3(path);
  client.pragma('journal_mode = WAL');
  client.pragma('foreign_keys = ON');
  return {
    db: drizzleSqlite(client, { schema: sqliteSchema }),
    close: () => client.close(),
  };
}

/** `DATABASE_URL` values starting with `postgres` select the networked store. */
export function isPostgresUrl(url: string | undefined): url is string {
  return typeof url === 'string' && url.trim().startsWith('postgres');
}
