import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    testTimeout: 10000,
    // Run test files in sequence; several share the logger and command registry
    fileParallelism: false,
  },
});
