import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts', 'device/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
