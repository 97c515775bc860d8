import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_TO_FILE: 'false',
      LOG_LEVEL: 'error',
    },
    testTimeout: 10000,
  },
});
