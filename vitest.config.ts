import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: [
        'src/index.ts',        // Process entry point (reads env, binds transports)
        'dist/**',
        'node_modules/**',
        '**/*.test.ts',
        'vitest.config.ts',
        'tests/helpers/**',    // Test helpers
      ],
      thresholds: {
        // Global thresholds
        branches: 70,
        functions: 80,
        lines: 80,
        statements: 80,
        // The write path and derived statistics carry the data invariants
        'src/ingest/normalizer.ts': {
          branches: 90,
          functions: 100,
          lines: 95,
          statements: 95
        },
        'src/store/updates.ts': {
          branches: 90,
          functions: 100,
          lines: 95,
          statements: 95
        },
        'src/aggregator.ts': {
          branches: 85,
          functions: 100,
          lines: 95,
          statements: 95
        }
      }
    }
  }
});
