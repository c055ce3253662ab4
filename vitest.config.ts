import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // sharp encodes and CDK synthesis both take a few seconds on a cold start
    testTimeout: 30000,
  },
});
