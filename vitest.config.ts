import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['prop-designer/src/tests/**/*.test.ts'],
    environment: 'node',
  },
})
