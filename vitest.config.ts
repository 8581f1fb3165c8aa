import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageEntry = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bookscan/types': packageEntry('types'),
      '@bookscan/storage': packageEntry('storage'),
      '@bookscan/ocr-engine': packageEntry('ocr-engine'),
      '@bookscan/scanner': packageEntry('scanner'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
  },
});
