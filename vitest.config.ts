import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Set test timeout
    testTimeout: 10000,
    // Use threads for better performance
    pool: 'threads',
  },
});
