import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['power-bridge/src/**/*.test.ts'],
    environment: 'node',
  },
});
