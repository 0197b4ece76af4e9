import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text-summary', 'text', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'dist/**',
        'src/types/**',
        'src/test/**',
        '**/*.d.ts',
      ],
    },
  },
})
