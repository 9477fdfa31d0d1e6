import { fileURLToPath } from 'node:url';
import { migrate as migratePg } from 'drizzle-orm/postgres-js/migrator';
import { migrate as migrateSqlite } from 'drizzle-orm/better-sqlite3/migrator';
import type { Database, SqliteDatabase } from './client';

export type Dialect = 'pg' | 'sqlite';

/** drizzle-kit output folder (SQL files plus `meta/_journal.json`) for a dialect. */
export function migrationsFolder(dialect: Dialect): string {
  return fileURLToPath(new URL(`../migrations/${dialect}`, import.meta.url));
}

/**
 * Applies pending migrations in one transaction. Applied ones are recorded in
 * drizzle's `__drizzle_migrations` table and skipped next time.
 */
export async function applyPgSchema(db: Database, folder: string = migrationsFolder('pg')): Promise<void> {
  await migratePg(db, { migrationsFolder: folder });
}

export function applySqliteSchema(db: SqliteDatabase, folder: string = migrationsFolder('sqlite')): void {
  migrateSqlite(db, { migrationsFolder: folder });
}
