import { defineConfig } from 'vitest/config';

/**
 * fieldwarden - Vitest configuration
 *
 * Deterministic runs across the monorepo:
 * - Platform-aware pool selection
 * - No retries so flaky behavior surfaces immediately
 * - Property-based run counts driven by FC_NUM_RUNS
 */

// Windows uses threads for compatibility, Unix-like systems use forks for isolation
const getPoolConfig = () => {
  const pool = process.platform === 'win32' ? 'threads' : 'forks';

  return {
    pool,
    poolOptions: {
      threads: {
        singleThread: false,
        isolate: true,
      },
      forks: {
        isolate: true,
      },
    },
  } as const;
};

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    ...getPoolConfig(),

    // Test files pattern - includes all packages in the monorepo
    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,

    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
