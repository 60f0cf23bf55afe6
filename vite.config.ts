import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      src: fromRoot('./src'),
      components: fromRoot('./src/components'),
      pages: fromRoot('./src/pages'),
      services: fromRoot('./src/services'),
      stores: fromRoot('./src/stores'),
      utils: fromRoot('./src/utils'),
    },
  },
  server: {
    // Backend of the forecast API during development
    proxy: { '/api': process.env.API_URL ?? 'http://localhost:8000' },
  },
  test: {
    environment: 'jsdom',
    setupFiles: ['./test/setup.ts'],
    include: ['__tests__/**/*.test.ts'],
  },
});
