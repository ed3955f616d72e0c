import { spawnSync as nodeSpawnSync } from 'child_process'
import type { SpawnSyncReturns, SpawnSyncOptions } from 'child_process'
import { createRequire } from 'module'

/**
 * Spawn a command synchronously. Returns the full result including status.
 */
export function spawnCommand(
  cmd: string,
  args: string[],
  opts?: SpawnSyncOptions,
): SpawnSyncReturns<string> {
  return nodeSpawnSync(cmd, args, { ...opts, encoding: 'utf-8' })
}

/**
 * Create a require function so ESM modules can load CommonJS/UMD packages.
 * Usage: const require = createModuleRequire(import.meta.url)
 */
export function createModuleRequire(metaUrl: string): NodeRequire {
  return createRequire(metaUrl)
}
