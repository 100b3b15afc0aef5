import { defineConfig } from 'vitest/config';

/**
 * Runs every workspace's tests from their TypeScript sources.
 */
export default defineConfig({
  test: {
    include: [
      'packages/*/test/**/*.test.ts',
      'apps/*/test/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 30000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
