import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NO_SPINNERS: '1',
      NO_COLORS: '1',
    },
  },
});
