import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 10_000,
    // Logs stay quiet unless a developer opts in.
    env: {
      BACKUP_RESTORE_LOG_LEVEL: process.env['BACKUP_RESTORE_LOG_LEVEL'] ?? 'silent',
    },
  },
});
