import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const srcDir = fileURLToPath(new URL('./src/', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@domain\//, replacement: `${srcDir}domain/` },
      { find: /^@\//, replacement: srcDir },
    ],
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
