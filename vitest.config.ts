import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['artnet-*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
});
