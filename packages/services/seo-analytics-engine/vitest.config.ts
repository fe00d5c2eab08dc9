import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveFromHere = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'seo-analytics-engine',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@seo-insights/platform-core': resolveFromHere('../../platform-core/src/index.ts'),
      '@seo-insights/shared-contracts': resolveFromHere('../../shared/contracts/src/index.ts'),
    },
  },
});
