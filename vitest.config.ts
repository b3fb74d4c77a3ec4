import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Storage tests share temp SQLite files per test, not across workers
    pool: 'forks',
  },
});
