import { defineConfig } from 'vitest/config';

// Window boundaries are computed in local time; pin it so fixtures are stable.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    env: { TZ: 'UTC' },
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['apps/cli/src/index.ts'],
    },
  },
});
