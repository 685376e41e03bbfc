import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'road-reference',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    // better-sqlite3 is a native module; forks isolate it per test file
    pool: 'forks',
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
