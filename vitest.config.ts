import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: 30000, // Longer timeout for process tests
    hookTimeout: 10000,
  },
});
