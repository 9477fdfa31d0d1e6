export { sql } from 'drizzle-orm';
export { createPgDatabase, createSqliteDatabase, isPostgresUrl } from './client';
export type { Database, SqliteDatabase, PgHandle, SqliteHandle, PgConnectionOptions } from './client';
export { applyPgSchema, applySqliteSchema, migrationsFolder } from './apply-schema';
export type { Dialect } from './apply-schema';
export * from './schema';
export * as sqliteSchema from './schema/sqlite';
