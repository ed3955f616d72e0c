import { getConfig } from '../../L1-infra/config/environment.js'
import { HttpAssetFetcher } from '../../L2-clients/http/assetFetcher.js'
import { AssetCache } from '../../L3-services/assetCache/assetCache.js'

/** Re-hash every cached object; exit code 1 when corrupt objects remain. */
export async function runCacheVerify(options: { remove?: boolean } = {}): Promise<number> {
  const config = getConfig()
  const cache = new AssetCache({
    root: config.CACHE_DIR,
    fetcher: new HttpAssetFetcher({ timeoutMs: config.fetchTimeoutMs, retries: config.fetchRetries }),
  })

  const result = await cache.verify({ remove: options.remove })
  console.log(`Checked ${result.checked} cached object(s) in ${cache.root}`)
  if (result.corrupt.length === 0) {
    console.log('  All objects match their digests ✅')
    return 0
  }

  for (const digest of result.corrupt) {
    console.log(`  ❌ ${digest}`)
  }
  if (options.remove) {
    console.log(`  Removed ${result.removed} corrupt object(s); they will be fetched again on the next render.`)
    return 0
  }
  console.log(`  ${result.corrupt.length} corrupt object(s). Run again with --remove to delete them.`)
  return 1
}
