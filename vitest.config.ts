import { defineConfig } from 'vitest/config';

// Off-UTC host zone, so local-time date readings surface in tests.
process.env.TZ = 'America/New_York';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
  },
});
