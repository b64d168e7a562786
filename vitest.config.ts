import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['backend/src/**/*.test.ts', 'shared/**/*.test.ts', 'dashboard/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    onConsoleLog: () => false,
  },
});
