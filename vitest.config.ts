/**
 * Vitest Configuration for req-sync
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Include test files
    include: ['tests/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Environment
    environment: 'node',

    // Type checking
    typecheck: {
      enabled: false, // Use tsc --noEmit separately
    },
  },
});
