import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  resolve: {
    alias: {
      '@resonance/shared': fileURLToPath(new URL('./packages/shared/index.ts', import.meta.url)),
      '@resonance/stabilizer': fileURLToPath(new URL('./packages/stabilizer/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['tests/**/*.test.ts'],
  },
});
