import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'postgresql',
  schema: ['./src/schema/occupancy.ts', './src/schema/financial.ts', './src/schema/locks.ts'],
  out: './migrations/pg',
  dbCredentials: {
    url: process.env.DATABASE_URL ?? 'postgres://localhost:5432/hourwise',
  },
  strict: true,
});
