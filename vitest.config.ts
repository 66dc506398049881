import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'backend/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
