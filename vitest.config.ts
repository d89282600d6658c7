import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['Shared/tests/**/*.test.ts', 'Orchestrator/tests/**/*.test.ts'],
    testTimeout: 15000,
    restoreMocks: true,
  },
});
