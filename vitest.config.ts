import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      SLACKMD_LOG_LEVEL: 'silent',
      SLACKMD_LOG_FORMAT: 'json',
    },
  },
});
