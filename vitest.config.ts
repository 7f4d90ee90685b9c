import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // CLI tests chdir into temp projects, which worker threads do not allow
    pool: 'forks',
    env: {
      NO_COLOR: '1',
    },
  },
});
