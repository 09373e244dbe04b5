import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.spec.ts'],
    setupFiles: ['test/setup-env.ts'],
    clearMocks: true,
    restoreMocks: true,
    // Argon2id derivations run on the libuv pool; keep headroom on slow CI hosts.
    testTimeout: 20_000,
  },
});
