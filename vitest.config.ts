import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const workspace = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

/**
 * Vitest configuration shared by every workspace
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/*.config.*',
        '**/__tests__/**',
        '**/*.test.ts',
        '**/index.ts', // Export files
      ],
    },
  },
  resolve: {
    alias: {
      '@simbatch/core': workspace('./packages/core/src/index.ts'),
      '@simbatch/similarity': workspace('./packages/similarity/src/index.ts'),
      '@simbatch/sources': workspace('./packages/sources/src/index.ts'),
      '@simbatch/jobs': workspace('./packages/jobs/src/index.ts'),
    },
  },
});
