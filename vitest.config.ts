import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    globals: false,
    // Rasterizing Letter pages at 150+ DPI is slow on small CI machines
    testTimeout: 30000,
  },
});
