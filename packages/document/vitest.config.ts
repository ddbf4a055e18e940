import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node'
  },
  resolve: {
    alias: {
      '@scriptforge/core/jobs': resolve(__dirname, '../core/src/jobs/index.ts'),
      '@scriptforge/core': resolve(__dirname, '../core/src/index.ts'),
      '@scriptforge/fixtures': resolve(__dirname, '../fixtures/src/index.ts')
    }
  }
});
