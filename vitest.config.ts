import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Git-backed suites shell out to git in temp directories
    testTimeout: 20000,
  },
});
