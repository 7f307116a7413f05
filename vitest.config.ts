import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/cli/**'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@core': fromRoot('./src/core'),
      '@scanners': fromRoot('./src/scanners'),
      '@shared': fromRoot('./src/shared'),
      '@': fromRoot('./src'),
    },
  },
});
