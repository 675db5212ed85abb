import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for evidence-algebra
 *
 * Tests live beside the sources in `__tests__/` directories. Worker count
 * can be pinned with EVIDENCE_TEST_WORKERS.
 */
const envWorkers = Number.parseInt(process.env.EVIDENCE_TEST_WORKERS ?? '', 10);

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    ...(Number.isInteger(envWorkers) && envWorkers > 0 ? { maxWorkers: envWorkers, minWorkers: 1 } : {}),
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
