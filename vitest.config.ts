import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'tests/integration/**/*.integration.test.ts'],
  },
  resolve: {
    alias: {
      '@eavstore/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@eavstore/actions': fileURLToPath(
        new URL('./packages/actions/src/index.ts', import.meta.url),
      ),
    },
  },
});
