import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    env: { NODE_ENV: 'test' },
    watch: false,
    testTimeout: 30000, // property tests
    hookTimeout: 10000,
    pool: 'forks', // better-sqlite3 handles stay in one process
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
  },
})
