import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    watch: false,
    // keep the static Logger quiet unless a test opts in
    env: {
      LOG_LEVEL: 'error'
    }
  }
});
