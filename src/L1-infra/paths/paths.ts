// Re-export the path functions the rest of the codebase uses
export { join, resolve, dirname, basename, extname, relative } from 'path'

import { existsSync } from 'fs'
import { join, resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

/**
 * Walk up from `startDir` until a directory containing `package.json` is found.
 * Throws if the filesystem root is reached without finding one.
 */
export function findRoot(startDir: string): string {
  let dir = resolve(startDir)
  while (true) {
    if (existsSync(join(dir, 'package.json'))) return dir
    const parent = dirname(dir)
    if (parent === dir) throw new Error(`Could not find project root from ${startDir}`)
    dir = parent
  }
}

let _cachedRoot: string | undefined

/** The installed package's root directory (where package.json lives). */
export function projectRoot(): string {
  if (!_cachedRoot) _cachedRoot = findRoot(__dirname)
  return _cachedRoot
}

