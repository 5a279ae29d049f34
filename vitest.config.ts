import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    setupFiles: ['tests/test-setup.ts']
  },
  resolve: {
    alias: {
      '@/lib': fileURLToPath(new URL('./lib', import.meta.url)),
      '@/config': fileURLToPath(new URL('./config', import.meta.url)),
      '@/scripts': fileURLToPath(new URL('./scripts', import.meta.url))
    }
  }
});
