import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));
const fromRoot = (...segments: string[]) => path.resolve(rootDir, ...segments);

export default defineConfig({
  resolve: {
    alias: {
      '@adforge/shared': fromRoot('packages/shared/src')
    }
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/**/*.test.ts', 'packages/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
    env: {
      NODE_ENV: 'test'
    },
    sequence: {
      seed: 12345
    }
  }
});
