import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export built files from dist/; tests run against their sources.
const source = (dir: string): string => fileURLToPath(new URL(`./${dir}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@linewright/contracts': source('packages/layout-engine/contracts'),
      '@linewright/style-engine': source('packages/layout-engine/style-engine'),
      '@linewright/measuring-dom': source('packages/layout-engine/measuring/dom'),
      '@linewright/html-adapter': source('packages/layout-engine/html-adapter'),
      '@linewright/layout-engine': source('packages/layout-engine/layout-engine'),
      '@linewright/painter-dom': source('packages/layout-engine/painters/dom'),
      '@linewright/layout-bridge': source('packages/layout-engine/layout-bridge'),
    },
  },
  test: {
    name: 'linewright',
    environment: 'node',
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
