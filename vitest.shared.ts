import { fileURLToPath } from 'node:url'

// Workspace packages resolve to their sources so tests never need a build.
export const sharedConfig = {
  test: {
    alias: {
      '@foamcsv/core': fileURLToPath(new URL('./packages/foamcsv-core/src/index.ts', import.meta.url)),
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
}
