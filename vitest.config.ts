import { defineConfig } from 'vitest/config'

// Workspace packages resolve to their TypeScript sources under this condition.
const conditions = ['evs-source', 'module', 'node', 'development|production']

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.test.ts',
        'packages/*/src/test-utils/**',
      ],
    },
  },
})
