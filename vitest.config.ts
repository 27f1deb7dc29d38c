import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    env: {
      ELEVENLABS_API_KEY: '',
      LOG_LEVEL: 'error',
    },
  },
});
