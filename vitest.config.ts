import { defaultExclude, defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/**/*.test.ts', 'lambdas/**/*.test.ts'],
    env: {
      POWERTOOLS_LOG_LEVEL: 'SILENT',
      POWERTOOLS_TRACE_ENABLED: 'false',
      POWERTOOLS_METRICS_NAMESPACE: 'OralHistoryTest',
    },
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      exclude: [...defaultExclude, '**/*.test.ts', '**/mock-utils/**'],
    },
    testTimeout: Number(process.env.TEST_TIMEOUT ?? 5000),
  },
})
