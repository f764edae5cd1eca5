import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@csv2ofx/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@csv2ofx/csv-decoder': path.resolve(rootDir, 'packages/csv-decoder/src/index.ts'),
      '@csv2ofx/assembler': path.resolve(rootDir, 'packages/assembler/src/index.ts'),
      '@csv2ofx/output': path.resolve(rootDir, 'packages/output/src/index.ts'),
      '@csv2ofx/converter': path.resolve(rootDir, 'packages/converter/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
