import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // -------------------------------------------------------------------------
    // Execution environment
    // -------------------------------------------------------------------------
    environment: 'node',

    // -------------------------------------------------------------------------
    // Test discovery
    // Explicit patterns avoid accidental execution of helper files.
    // -------------------------------------------------------------------------
    include: ['src/**/*.test.ts', 'src/**/*.test.tsx'],
    exclude: ['node_modules/**', 'dist/**', 'coverage/**', '**/*.d.ts'],

    // -------------------------------------------------------------------------
    // Coverage (only collected by `npm run test:coverage`)
    // -------------------------------------------------------------------------
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts', 'src/**/*.tsx'],
      exclude: [
        '**/*.test.*',
        '**/__test-utils__/**',
        // Barrel files (re-export only, no executable code)
        'src/index.ts',
        'src/cli/**/index.ts',
        'src/cli/modules/types.ts',
      ],
      reportsDirectory: 'coverage',
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // -------------------------------------------------------------------------
    // Globals
    // Allowed explicitly to reduce boilerplate.
    // -------------------------------------------------------------------------
    globals: true,

    // -------------------------------------------------------------------------
    // Determinism & safety
    // -------------------------------------------------------------------------
    clearMocks: true,
    restoreMocks: true,
    mockReset: true,
  },
});
