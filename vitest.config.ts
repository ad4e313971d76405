import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./server/tests/setup.ts'],
    include: ['server/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        'server/utils/deduplication/**',
        'server/utils/pagination/**',
        'server/quotes/**',
        'server/storage.ts',
      ],
      exclude: ['**/node_modules/**', '**/tests/**', '**/*.test.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
  },
  resolve: {
    alias: {
      '@server': path.resolve(rootDir, './server'),
      '@shared': path.resolve(rootDir, './shared'),
    },
  },
});
