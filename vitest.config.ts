import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgerline/types': packageEntry('types'),
      '@ledgerline/pdf-extract': packageEntry('pdf-extract'),
      '@ledgerline/statement-parser': packageEntry('statement-parser'),
      '@ledgerline/output': packageEntry('output'),
      '@ledgerline/categorizer': packageEntry('categorizer'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
