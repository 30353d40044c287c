import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    globals: false,
    env: {
      ENVIRONMENT: 'test',
      LOG_LEVEL: 'error',
    },
  },
});
