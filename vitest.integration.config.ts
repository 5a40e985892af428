import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Needs DATABASE_URL; suites skip themselves without it
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    minWorkers: 1,
    maxWorkers: 1,
    maxConcurrency: 1,
  },
});
