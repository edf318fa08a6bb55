import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Each package defines its own include pattern
    projects: ['packages/core', 'packages/cli'],
  },
})
