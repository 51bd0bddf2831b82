import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const repoRoot = path.dirname(fileURLToPath(import.meta.url));
const alias = {
  '@rest-action/core': path.resolve(repoRoot, 'libs/rest-action-core/src/index.ts'),
  '@rest-action/pagination': path.resolve(repoRoot, 'libs/rest-action-pagination/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
