import { defineConfig } from 'vitest/config';

// Day and hour grouping use local time; pin it so fixtures land on fixed days.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['awtime-cli/tests/**/*.test.ts'],
    env: { TZ: 'UTC' },
  },
});
