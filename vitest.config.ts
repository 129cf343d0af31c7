import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@terrarium/service-engine': path.resolve(__dirname, 'packages/service-engine/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node'
  }
});
