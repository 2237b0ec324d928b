import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      // Keep pino from spawning its file transport during tests
      BOOK_SEARCH_LOG_LEVEL: 'silent',
    },
  },
});
