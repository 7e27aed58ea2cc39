import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the feedback workflow service
 *
 * Unit and HTTP integration tests run in the node environment with the
 * database module mocked; nothing connects to PostgreSQL or SMTP.
 */
export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/server.ts', 'src/db/seed.ts'],
    },

    testTimeout: 10000,
    hookTimeout: 10000,
    reporters: ['default'],

    // Mock implementations are reset between tests; set them in beforeEach
    clearMocks: true,
    mockReset: true,
    restoreMocks: true,

    sequence: {
      shuffle: false,
    },
  },
});
