import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 30_000,
    env: { LOG_LEVEL: 'error' },
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true }, // better-sqlite3 handles are per-process
    },
  },
});
