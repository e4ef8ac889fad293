import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['lib/providers/src/**/*.test.ts', 'screener/tests/**/*.test.ts'],
    environment: 'node',
  },
});
