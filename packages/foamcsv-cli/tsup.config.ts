import { defineConfig } from 'tsup'

const requireBanner = `import { createRequire } from 'node:module'
const require = createRequire(import.meta.url)
`

export default defineConfig({
  entry: ['src/index.ts', 'src/bin/foamcsv.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  // Workspace packages export their TypeScript sources; inline them so `dist/bin/foamcsv.js` runs under plain Node.js.
  noExternal: [/^@foamcsv\//],
  // Bundled CJS dependencies may call `require("node:*")`; the ESM output needs a real `require`.
  banner: { js: requireBanner },
})
