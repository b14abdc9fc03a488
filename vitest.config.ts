import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, 'shared'),
    },
  },
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['shared/**/*.test.ts', 'server/**/*.test.{ts,tsx}', 'src/**/*.test.ts'],
    environment: 'node',
    env: {
      GEMINI_API_KEY: 'test-key',
    },
  },
});
