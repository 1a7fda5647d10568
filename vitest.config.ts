import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      DB_PATH: ':memory:',
      WORKER_THREADS: '1',
    },
  },
});
