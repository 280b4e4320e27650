import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
    env: {
      LOG_LEVEL: 'error'
    },
    server: {
      deps: {
        inline: [],
        external: [/better-sqlite3/]
      }
    }
  }
});
