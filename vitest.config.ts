import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import path from 'path';

const projectRoot = path.dirname(fileURLToPath(new URL(import.meta.url)));
const resolveFromRoot = (p: string) => path.join(projectRoot, p);

export default defineConfig({
  test: {
    include: [
      'packages/**/tests/unit/**/*.test.ts',
      'packages/**/tests/properties/**/*.test.ts',
      'packages/**/tests/integration/**/*.test.ts',
      'tests/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '**/node_modules/**', '**/dist/**'],
    environment: 'node',
    globals: true,
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ['tests/setup.ts'],
    testTimeout: 10000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      reportsDirectory: 'coverage',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['packages/**/src/**/index.ts', 'packages/cli/src/bin/**'],
    },
  },
  resolve: {
    alias: {
      '@stratlab/core': resolveFromRoot('packages/core/src/index.ts'),
      '@stratlab/utils': resolveFromRoot('packages/utils/src/index.ts'),
      '@stratlab/backtest': resolveFromRoot('packages/backtest/src/index.ts'),
      '@stratlab/selection': resolveFromRoot('packages/selection/src/index.ts'),
      '@stratlab/storage': resolveFromRoot('packages/storage/src/index.ts'),
      '@stratlab/strategies': resolveFromRoot('packages/strategies/src/index.ts'),
      '@stratlab/jobs': resolveFromRoot('packages/jobs/src/index.ts'),
      '@stratlab/cli': resolveFromRoot('packages/cli/src/index.ts'),
    },
  },
});
