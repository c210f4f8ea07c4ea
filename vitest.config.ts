import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // CLI and runtime tests run short real-timer trials
    testTimeout: 10000,
    restoreMocks: true,
  },
});
