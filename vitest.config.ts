import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Several suites swap process.env and spawn short-lived node children.
    // Keep files serial so env mutations never leak across suites.
    fileParallelism: false,
    pool: 'threads',
    maxWorkers: 1,
    testTimeout: 30_000,
  },
});
