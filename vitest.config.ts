import { fileURLToPath } from 'node:url'
import { defineConfig, configDefaults } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.spec.ts'],
    exclude: [...configDefaults.exclude, 'dist/**'],
    root: fileURLToPath(new URL('./', import.meta.url)),
    setupFiles: ['./packages/workflow-server/__tests__/setup.ts'],
    restoreMocks: true
  }
})
