import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defineConfig } from 'vitest/config';

process.env.NODE_NO_WARNINGS ??= '1';

/**
 * Vitest configuration for the backlog engine.
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks',
    env: {
      BACKLOG_LOG_LEVEL: 'silent',
      // Keep a developer's ~/.backlog/config.json out of the cascade
      BACKLOG_HOME: join(tmpdir(), 'backlog-test-home'),
    },
  },
});
