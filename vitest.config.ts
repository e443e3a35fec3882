import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const src = (dir: string) => fileURLToPath(new URL(`./src/${dir}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@api': src('api'),
      '@config': src('config'),
      '@core': src('core'),
      '@infra': src('infrastructure'),
      '@middleware': src('middleware'),
      '@services': src('services'),
      '@test': src('test'),
      '@utils': src('utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test/setupEnv.ts'],
  },
});
