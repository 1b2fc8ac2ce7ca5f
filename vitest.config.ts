import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: [
      'packages/**/src/**/*.spec.ts',
      'packages/**/src/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 20000,

    coverage: {
      provider: 'v8',
      all: true,
      include: ['packages/**/src/**/*.ts'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
      exclude: [
        '**/dist/**',
        '**/__tests__/**',
        '**/*.spec.*',
        '**/*.test.*',
        'packages/cli/src/index.ts',
      ],
    },
  },
})
