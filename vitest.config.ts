import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Tail-based engine tests wait on file watchers
    testTimeout: 10000,
    globals: true,
  },
});
