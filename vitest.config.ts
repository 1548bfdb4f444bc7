import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    restoreMocks: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        // Entry points (imports/exports only)
        'src/index.ts',
        'src/start-server.ts',
        'src/core/index.ts',
        'src/config/index.ts',
        'src/oauth/index.ts',
        // Type-only files
        'src/core/types.ts',
        'src/persistence/types.ts',
      ],
    },
  },
});
