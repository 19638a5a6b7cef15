import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@barwatch/logger': pkg('logger'),
      '@barwatch/contracts': pkg('contracts'),
      '@barwatch/market-data-core': pkg('market-data-core'),
      '@barwatch/db-simple': pkg('db-simple'),
      '@barwatch/bar-store': pkg('bar-store'),
      '@barwatch/detector': pkg('detector'),
      '@barwatch/ingestion': pkg('ingestion'),
    },
  },
});
