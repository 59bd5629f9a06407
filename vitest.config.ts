/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/_tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    hookTimeout: 30000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error', // Only show errors in tests by default
    },
  },
});
