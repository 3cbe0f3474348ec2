import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'],
    // Suites share one database and both run migrations
    pool: 'forks',
    fileParallelism: false,
    maxConcurrency: 1,
    testTimeout: 20000,
  },
});
