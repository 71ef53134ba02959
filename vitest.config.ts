import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
  resolve: {
    alias: {
      '@metaquery/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@metaquery/hive': path.resolve(root, 'packages/hive/src/index.ts'),
    },
  },
});
