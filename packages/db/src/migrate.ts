import dotenv from 'dotenv';

dotenv.config({ path: '../../.env.local' });
dotenv.config({ path: '../../.env' });

import { createPgDatabase, createSqliteDatabase, isPostgresUrl } from './client';
import { applyPgSchema, applySqliteSchema } from './apply-schema';

async function runMigrations() {
  const url = process.env.DATABASE_URL;
  if (isPostgresUrl(url)) {
    const masked = url.replace(/:[^:@]+@/, ':***@');
    console.log(`Applying schema to Postgres: ${masked}`);
    const handle = createPgDatabase(url, { max: 1 });
    try {
      await applyPgSchema(handle.db);
      console.log('Migrations complete.');
    } finally {
      await handle.close();
    }
    return;
  }

  const path = process.env.SQLITE_PATH || '../../data/hourwise.db';
  console.log(`Applying schema to SQLite: ${path}`);
  const handle = createSqliteDatabase(path);
  try {
    applySqliteSchema(handle.db);
    console.log('Migrations complete.');
  } finally {
    handle.close();
  }
}

runMigrations().catch((err) => {
  console.error('Migration failed:', err);
  process.exit(1);
});
