import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: [
      'packages/**/test/**/*.spec.ts',
      'packages/cli/src/__tests__/**/*.test.ts'
    ],
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    env: {
      // Fake runners answer to this binary name
      RUNWAY_GCLOUD_BIN: 'gcloud',
      RUNWAY_CONFIG_FILE: ''
    }
  }
})
