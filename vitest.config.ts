import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@liftkit/diff-engine': workspace('./packages/diff-engine/src/index.ts'),
      '@liftkit/rewrite-rules': workspace('./packages/rewrite-rules/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
