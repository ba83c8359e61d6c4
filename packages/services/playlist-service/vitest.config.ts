import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolvePackage = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'playlist-service',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@playlist-tui/platform-core': resolvePackage('../../platform-core/src/index.ts'),
      '@playlist-tui/shared-contracts': resolvePackage('../../shared/contracts/src/index.ts'),
      '@playlist-tui/test-utils': resolvePackage('../../shared/test-utils/src/index.ts'),
    },
  },
});
