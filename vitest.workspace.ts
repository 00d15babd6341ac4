/**
 * Vitest Workspace Configuration
 *
 * Workspace Projects:
 * - core: weft package tests
 * - cli: weft-cli package tests
 *
 * Shared Configuration:
 * - globals: true (enables global test functions)
 * - environment: 'node' (Node.js test environment)
 * - coverage: configured in vitest.config.ts (root-level only)
 *
 * Run specific projects:
 *   npx vitest --project=core
 *   npx vitest --project=cli
 */
import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  // Core package (weft)
  {
    test: {
      name: 'core',
      globals: true,
      environment: 'node',
      include: ['packages/core/tests/**/*.test.ts'],
    },
  },
  // CLI package (weft-cli)
  {
    test: {
      name: 'cli',
      globals: true,
      environment: 'node',
      include: ['packages/cli/tests/**/*.test.ts'],
    },
  },
]);
