import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/feed/test/**/*.spec.ts'],
    environment: 'node',
  },
});
