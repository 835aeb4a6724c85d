import os from 'os';
import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // The entry-point test changes the working directory
    pool: 'forks',
    env: {
      LOG_LEVEL: 'FATAL',
      BOT_LOG_DIR: path.join(os.tmpdir(), 'support-tips-bot-test-logs'),
    },
    testTimeout: 10000,
  },
});
