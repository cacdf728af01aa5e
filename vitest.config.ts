import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const libPath = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));
const alias = {
  '@relaykit/dependency-registry': libPath('./libs/dependency-registry/src/index.ts'),
  '@relaykit/request-pipeline': libPath('./libs/request-pipeline/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
