import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

// No __dirname under "type": "module"
const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    // Module-scope state (fetch stubs, log handlers) stays within one file
    isolate: true,
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      exclude: ['node_modules/', 'test/', '**/*.d.ts'],
    },
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@security': path.resolve(__dirname, 'packages/security'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@utils': path.resolve(__dirname, 'packages/utils'),
      '@domain': path.resolve(__dirname, 'domains'),
    },
  },
});
