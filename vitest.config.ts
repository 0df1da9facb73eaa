import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const require = createRequire(import.meta.url);

export default defineConfig({
  test: {
    // Node exposes WebCrypto and fs; no DOM needed
    environment: 'node',

    // Checks WebCrypto and quiets the logger
    setupFiles: ['./apps/client/src/test/setup.ts'],

    // Global test timeout (30 seconds for slow tests)
    testTimeout: 30000,

    // Hook timeout
    hookTimeout: 10000,

    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],

    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/**', 'dist/**', '**/src/test/**', '**/*.d.ts'],
    },

    reporters: ['default'],
  },

  resolve: {
    alias: {
      '@veilpost/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      // The ESM build of libsodium-wrappers does not resolve under Vite; use the CommonJS one
      'libsodium-wrappers': require.resolve('libsodium-wrappers'),
    },
  },
});
