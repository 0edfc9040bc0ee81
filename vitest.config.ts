import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    watch: false,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
