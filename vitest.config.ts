import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@spaced-review/shared/scheduler': path.resolve(rootDir, 'shared/scheduler/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/**/*.test.ts', 'server/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['shared/**', 'server/src/services/**', 'server/src/db/**'],
    },
  },
});
