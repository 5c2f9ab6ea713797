import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import path from 'node:path'

import packageJson from './package.json'

/** Runtime dependencies, loaded from node_modules instead of bundled. */
const dependencies = new Set(Object.keys(packageJson.dependencies))

/**
 * Check if an import stays outside the bundle: Node built-ins and the runtime
 * dependencies, including their subpath imports.
 *
 * @param id - Imported module ID.
 * @returns True for modules resolved at run time.
 */
function isRuntimeImport(id: string): boolean {
  if (id.startsWith('node:')) {
    return true
  }
  let [scopeOrName = '', name] = id.split('/')
  let packageName = scopeOrName.startsWith('@')
    ? `${scopeOrName}/${name}`
    : scopeOrName
  return dependencies.has(packageName)
}

/** Vite configuration for the library entry and the CLI. */
export default defineConfig({
  build: {
    lib: {
      entry: {
        'cli/index': path.resolve(import.meta.dirname, 'cli/index.ts'),
        'core/index': path.resolve(import.meta.dirname, 'core/index.ts'),
      },
      formats: ['es'],
    },
    rollupOptions: {
      external: isRuntimeImport,
    },
    target: 'node20',
    minify: false,
  },
  plugins: [
    dts({
      include: ['cli', 'core', 'types'].map(directory =>
        path.resolve(import.meta.dirname, directory),
      ),
      entryRoot: import.meta.dirname,
      copyDtsFiles: true,
    }),
  ],
})
