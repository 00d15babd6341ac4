import { defineConfig } from 'vitest/config';

// Coverage is a root-level option in Vitest; the per-project settings from
// vitest.workspace.ts live here.
export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/core/src/**/*.ts', 'packages/cli/src/**/*.ts'],
      exclude: ['packages/core/src/index.ts'],
    },
  },
});
