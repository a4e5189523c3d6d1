import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    env: {
      NODE_ENV: 'test',
      DATABASE_PATH: ':memory:',
      ENCRYPTION_KEY: 'test-secret',
      BANKING_MODE: 'sandbox',
      CLASSIFIER: 'statistical',
      SYNC_INTERVAL_MINUTES: '0'
    }
  }
});
