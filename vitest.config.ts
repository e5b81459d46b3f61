import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages resolve to their TypeScript sources
    conditions: ['source'],
  },
  ssr: {
    resolve: {
      conditions: ['source'],
    },
  },
  test: {
    include: ['Shared/tests/**/*.test.ts', 'RunBlock/tests/**/*.test.ts'],
    environment: 'node',
    // Tests spawn shells and wait on real timers
    pool: 'forks',
    testTimeout: 20_000,
    env: {
      RUNBLOCK_LOG_LEVEL: 'silent',
    },
  },
});
