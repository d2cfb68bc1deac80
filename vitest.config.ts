import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/src/**/*.spec.ts', 'packages/**/src/**/*.spec.ts'],
    testTimeout: 15000
  }
});
