import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolvePackage = (relative: string): string =>
  fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/index.ts',
        'packages/tui/src/cli.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'threads',
  },
  resolve: {
    alias: {
      '@necromancers-shell/core': resolvePackage('./packages/core/src/index.ts'),
      '@necromancers-shell/tui': resolvePackage('./packages/tui/src/index.ts'),
    },
  },
  esbuild: {
    target: 'node20',
  },
});
