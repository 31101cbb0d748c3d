import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_SILENT: 'true',
      LOG_TO_FILE: 'false',
    },
  },
});
