import {defineConfig} from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    disableConsoleIntercept: true,
    testTimeout: 20_000
  }
})
