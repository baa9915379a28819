import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@marketsim/core': path.resolve(__dirname, '../core/src/index.ts'),
      '@marketsim/agent': path.resolve(__dirname, '../agent/src/index.ts'),
    },
  },
});
