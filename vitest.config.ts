import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

/**
 * covermark - Vitest Configuration
 *
 * - Fixed seed for property-based tests
 * - No retries to surface issues immediately
 * - Every test runs under the quiescence check from @covermark/vitest/setup
 */

// Platform-specific pool configuration
const getPoolConfig = () => {
  // Windows uses threads; Unix-like systems use forks for better isolation
  const pool = process.platform === 'win32' ? 'threads' : 'forks';

  return {
    pool,
    poolOptions: {
      threads: { isolate: true },
      forks: { isolate: true },
    },
  } as const;
};

const isCI = process.env.CI === 'true';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    // ========================================================================
    // EXECUTION ENVIRONMENT
    // ========================================================================

    environment: 'node',

    ...getPoolConfig(),

    globalSetup: ['./test/global-setup.ts'],
    setupFiles: ['./test/setup.ts'],

    // ========================================================================
    // TEST DISCOVERY AND EXECUTION
    // ========================================================================

    include: ['packages/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    retry: 0,
    fileParallelism: !isCI,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    // ========================================================================
    // REPORTING
    // ========================================================================

    reporters: ['default'],
    silent: false,

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/__tests__/**'],
    },

    // ========================================================================
    // ENVIRONMENT VARIABLES
    // ========================================================================

    env: {
      NODE_ENV: 'test',
      COVERMARK_LOG_LEVEL: 'silent',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
