import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 15_000
  },
  resolve: {
    alias: {
      '@scriptforge/core/jobs': resolve(__dirname, '../../packages/core/src/jobs/index.ts'),
      '@scriptforge/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@scriptforge/document': resolve(__dirname, '../../packages/document/src/index.ts'),
      '@scriptforge/artifact-store': resolve(__dirname, '../../packages/artifact-store/src/index.ts'),
      '@scriptforge/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts')
    }
  }
});
