import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['backend/src/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
