import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for debt-hotspots
 *
 * Unit tests only: git is mocked through execa and every filesystem test
 * works in its own temp directory.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
