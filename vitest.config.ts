import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packageDir = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@gleaner/shared': packageDir('shared'),
      '@gleaner/schemas': packageDir('schemas'),
      '@gleaner/ingestion': packageDir('ingestion'),
      '@gleaner/core': packageDir('core'),
    },
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
