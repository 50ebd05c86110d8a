import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.{ts,tsx}', 'core/**/*.test.ts', 'tui/**/*.test.ts'],
  },
});
