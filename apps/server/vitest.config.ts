/**
 * Main Vitest Configuration
 *
 * Runs every unit and service test. Network, database and Redis are always
 * faked, so there is no separate integration group.
 */

import { defineConfig, mergeConfig } from 'vitest/config';
import { sharedConfig } from './vitest.shared.js';

export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['**/node_modules/**', '**/dist/**'],
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json-summary'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: [
          '**/*.test.ts',
          '**/__tests__/**',
          // Type-only files with no executable code
          '**/types.ts',
          // Process entry point
          'src/index.ts',
        ],
      },
    },
  })
);
