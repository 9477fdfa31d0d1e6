import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'sqlite',
  schema: ['./src/schema/sqlite/occupancy.ts', './src/schema/sqlite/financial.ts'],
  out: './migrations/sqlite',
  dbCredentials: {
    url: process.env.SQLITE_PATH ?? '../../data/hourwise.db',
  },
  strict: true,
});
