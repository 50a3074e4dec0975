import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    // 1. Force Vitest to ignore build artifacts
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**'
    ],
    // 2. Ensure it only looks for source files
    include: ['packages/**/*.{test,spec}.ts'],
  },
  // 3. Resolve the workspace packages straight to their TypeScript sources
  resolve: {
    alias: {
      '@voxqueue/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      '@voxqueue/client': fileURLToPath(new URL('./packages/client/src/index.ts', import.meta.url))
    }
  }
});
