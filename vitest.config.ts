import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['src/test/setup.ts'],
    include: ['__tests__/**/*.test.ts'],
    coverage: {
      enabled: false,
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: 'coverage',
      exclude: [
        'src/index.ts',
        'src/tools/**',
        'src/test/**',
        'src/contracts/**',
        'src/types/**',
        '__tests__/**',
        'vitest.config.*',
      ]
    }
  }
});
