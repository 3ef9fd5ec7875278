import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    root: './',
    include: ['test/**/*.e2e-spec.ts'],
    setupFiles: ['./test/setup.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    // Each file boots a full app instance
    fileParallelism: false,
    sequence: {
      concurrent: false,
    },
  },
  plugins: [swc.vite()],
});
