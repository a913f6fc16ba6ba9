import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for loomwork
 *
 * Tests live beside their sources under `__tests__/`. Everything runs in
 * process; time-dependent tests drive a ManualClock instead of real timers.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
  },
});
