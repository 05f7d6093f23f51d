import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@deepdub/shared': path.resolve(__dirname, 'packages/shared/src'),
      '@deepdub/client': path.resolve(__dirname, 'packages/client/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
