import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    root: path.resolve(__dirname),
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@rangefold/core': path.resolve(__dirname, '../core/src/index.ts'),
      '@rangefold/pipeline': path.resolve(__dirname, './src/index.ts'),
    },
  },
});
