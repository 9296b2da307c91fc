import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@libs/core': path.resolve(__dirname, 'libs/core/src'),
      '@libs/market-data': path.resolve(__dirname, 'libs/market-data/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
