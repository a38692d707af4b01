import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // One graphql instance for our code and the CommonJS @graphql-tools builds.
    alias: [{ find: /^graphql$/, replacement: 'graphql/index.js' }],
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
