import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [
      { find: /^types$/, replacement: fileURLToPath(new URL('./types.ts', import.meta.url)) },
      { find: /^src\//, replacement: fileURLToPath(new URL('./src/', import.meta.url)) },
    ],
  },
  test: {
    include: ['test/**/*.test.ts'],
  },
});
