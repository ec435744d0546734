import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Retry paths are exercised with fake sleeps, never real timers
    testTimeout: 10000,
  },
});
