/**
 * Vitest configuration.
 *
 * Every test runs in the default Node.js pool with fakes standing in for
 * SQS, Bedrock and Parameter Store, so no AWS credentials are needed.
 *
 * Usage: npm test
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    pool: 'threads',
    include: ['test/**/*.test.ts'],
  },
});
