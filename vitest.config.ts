import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tests/integration/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    alias: {
      '@requisition/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@requisition/intent': fileURLToPath(new URL('./packages/intent/src/index.ts', import.meta.url)),
      '@requisition/api': fileURLToPath(new URL('./packages/api/src/index.ts', import.meta.url)),
    },
  },
});
