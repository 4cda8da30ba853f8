import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tactica/types': packageSource('types'),
      '@tactica/source': packageSource('source'),
      '@tactica/core': packageSource('core'),
      '@tactica/pgn': packageSource('pgn'),
      '@tactica/test-utils': packageSource('test-utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});
