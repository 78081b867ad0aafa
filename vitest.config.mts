import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 and the sandbox workers are happier in child processes
    pool: 'forks',
    testTimeout: 20000,
    env: {
      LOG_LEVEL: 'silent',
      AUDIT_LOG_FILE: '',
    },
  },
});
