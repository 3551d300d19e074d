import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^src\//, replacement: root('./src/') },
      { find: /^types$/, replacement: root('./types.ts') },
      { find: /^index$/, replacement: root('./index.ts') },
    ],
  },
  test: {
    include: ['test/**/*.test.ts'],
  },
});
