import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__tests__/*.test.ts'],
    // Unsolvable boards are searched to exhaustion
    testTimeout: 120000
  }
});
