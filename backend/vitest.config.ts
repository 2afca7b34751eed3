import { defineConfig } from 'vitest/config';

// Every e2e/dal spec boots its own in-process Postgres (PGlite) and runs the
// migrations, which is slow on a cold worker; timeouts are sized for that.
export default defineConfig({
  test: {
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    environment: 'node',
    globals: true,
    restoreMocks: true,
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
