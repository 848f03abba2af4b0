import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
    testTimeout: 10000,
    env: {
      TURNKIT_LOG_LEVEL: 'silent',
    },
  },
});
