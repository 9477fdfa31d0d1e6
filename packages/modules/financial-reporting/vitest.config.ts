import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@hourwise/shared': fileURLToPath(new URL('../../shared/src', import.meta.url)),
      '@hourwise/db': fileURLToPath(new URL('../../db/src', import.meta.url)),
      '@hourwise/core': fileURLToPath(new URL('../../core/src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    testTimeout: 10_000,
    include: ['src/**/*.test.ts'],
  },
});
