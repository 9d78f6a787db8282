import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true, // So we don't need to import describe, it, etc.
    include: ['src/**/*.test.ts'],
  },
});
