import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'packages/core/tests/**/*.test.ts',
      'packages/server/src/**/*.test.ts',
      'packages/cli/tests/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 10_000,
  },
});
