import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Loop and process tests use real timers with short intervals
    testTimeout: 10_000,
    retry: 2,
  },
});
