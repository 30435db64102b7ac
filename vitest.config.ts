import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/**/*.d.ts'],
    },
  },
  resolve: {
    alias: {
      '@': path.resolve(root, 'src'),
      '@common': path.resolve(root, 'src/common'),
      '@database': path.resolve(root, 'src/database'),
      '@forwarding': path.resolve(root, 'src/forwarding'),
      '@api': path.resolve(root, 'src/api'),
    },
  },
});
