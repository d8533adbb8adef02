import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DATABASE_PATH: ':memory:',
      LOG_LEVEL: 'error',
      LOG_TO_FILE: 'false',
    },
  },
});
