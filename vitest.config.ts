import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['mcp-dynamo/src/**/*.test.ts'],
    environment: 'node',
  },
});
