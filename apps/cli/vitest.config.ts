import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'kcidb-selfhost',
    environment: 'node',
    globals: true,
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    clearMocks: true,
    restoreMocks: true,
  },
});
