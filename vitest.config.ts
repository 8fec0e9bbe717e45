import { defineConfig } from 'vitest/config'

/**
 * Vitest config for the decoder, scanner and CLI tests.
 *
 * Everything runs under Node.js; CLI tests write fixture files to a
 * temporary directory and remove it afterwards.
 */
export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts', 'src/cli/bin.ts'],
    },
  },
})
