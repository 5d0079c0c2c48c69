import { defineConfig } from 'vitest/config';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    // Global test configuration
    globals: true,
    environment: 'node',

    testTimeout: 10000,

    // Test file patterns
    include: [
      'packages/**/src/**/*.{test,spec}.ts',
      'packages/**/tests/**/*.{test,spec}.ts'
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ],

    // Test setup
    setupFiles: ['./test-setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'coverage/**',
        'dist/**',
        'packages/**/dist/**',
        '**/*.config.*',
        '**/test-setup.ts'
      ]
    }
  },

  // Resolve configuration for monorepo
  resolve: {
    alias: {
      '@poe-relay/shared': resolve(__dirname, 'packages/shared/src/index.ts'),
    }
  }
});
