import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/backend/tests/**/*.test.ts'],
    globals: false,
    restoreMocks: true,
    env: { REQUEST_LOG: 'off' },
  },
  resolve: {
    alias: {
      '@crossvote/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
    },
  },
});
