import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 20000,
    env: {
      OPERATOR_LOG_LEVEL: 'fatal',
    },
  },
});
