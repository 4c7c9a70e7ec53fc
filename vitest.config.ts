import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePackage = (path: string) =>
  fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@caveatkit/delegation-core': resolvePackage(
        './packages/delegation-core/src/index.ts',
      ),
      '@caveatkit/delegation-framework': resolvePackage(
        './packages/delegation-framework/src/index.ts',
      ),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    env: {
      CAVEATKIT_LOG_LEVEL: 'silent',
    },
  },
});
