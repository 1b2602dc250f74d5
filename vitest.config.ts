import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(root, 'node/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['node/tests/**/*.test.ts'],
    restoreMocks: true,
  },
});
