import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/*.spec.ts', 'packages/**/test/**/*.test.ts', 'examples/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
