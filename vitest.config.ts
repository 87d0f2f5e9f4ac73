import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packages = ['contracts', 'logger', 'series', 'swings', 'indicators', 'cli'];

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
  },
  resolve: {
    alias: Object.fromEntries(
      packages.map((name) => [
        `@swingta/${name}`,
        fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
      ])
    ),
  },
});
