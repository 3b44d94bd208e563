/**
 * @file packages/shared/vitest.config.ts
 * @description Test runner configuration for the shared contracts package.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
  },
});
