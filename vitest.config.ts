import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
      STORE_DRIVER: 'memory',
      LOG_LEVEL: 'error',
    },
  },
});
