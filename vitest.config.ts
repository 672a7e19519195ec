import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const src = (dir: string): string => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts', 'src/cli/index.ts', 'src/**/index.ts'],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
  resolve: {
    alias: {
      '@domain': src('domain'),
      '@infra': src('infrastructure'),
      '@features': src('features'),
      '@shared': src('shared'),
      '@cli': src('cli'),
    },
  },
});
