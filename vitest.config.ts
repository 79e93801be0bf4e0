import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/src/**/*.{test,spec}.ts'],
    restoreMocks: true,
    env: {
      LOG_LEVEL: 'silent'
    }
  },
  resolve: {
    alias: {
      '@orgscout/common': fileURLToPath(new URL('./services/common/src/index.ts', import.meta.url))
    }
  }
});
