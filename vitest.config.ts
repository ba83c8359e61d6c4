import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    projects: [
      'packages/platform-core/vitest.config.ts',
      'packages/shared/*/vitest.config.ts',
      'packages/services/*/vitest.config.ts',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text-summary'],
      reportsDirectory: './coverage',
      clean: true,
      include: ['packages/**/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/__tests__/**', '**/node_modules/**', '**/*.d.ts', '**/main.ts', '**/index.ts'],
    },
  },
});
