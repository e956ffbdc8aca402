import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    isolate: true,
    include: ['packages/*/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      // Use source files directly for tests (no build required)
      '@flowkit/core': path.resolve(rootDir, 'packages/core/src/index.ts'),
      '@flowkit/integrations': path.resolve(rootDir, 'packages/integrations/src/index.ts'),
    },
  },
});
