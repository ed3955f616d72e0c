import { removeFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { sha256Hex } from '../../L1-infra/hash/hash.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AssetFetcher } from '../../L2-clients/http/assetFetcher.js'
import type { AssetKind, AssetReference, CachedAsset } from '../../L0-pure/types/index.js'
import { describeReference, referenceKey } from '../../L0-pure/assets/references.js'
import { FetchFailedError, errorMessage, isPipelineError } from '../../L0-pure/errors/pipelineErrors.js'
import { AssetStore } from './assetStore.js'
import { validateAsset } from './assetValidation.js'
import type { AssetValidator } from './assetValidation.js'

// ── Types ────────────────────────────────────────────────────────────────────

export interface AssetCacheOptions {
  /** Root directory of the on-disk store */
  root: string
  fetcher: AssetFetcher
  validate?: AssetValidator
  /** Ignore the URL index and download every URL again (once per cache instance) */
  refresh?: boolean
}

export interface CacheStats {
  /** Served from memory or disk without calling the fetcher */
  hits: number
  misses: number
  /** Calls made to the fetcher */
  fetches: number
  bytesFetched: number
  failures: number
}

export interface VerifyResult {
  checked: number
  corrupt: string[]
  removed: number
}

// ── Cache ────────────────────────────────────────────────────────────────────

/**
 * Content-addressed asset cache with single-flight retrieval.
 *
 * Concurrent and repeated requests for one reference share a single promise,
 * so a reference is fetched at most once per cache instance. Completed entries
 * stay in memory; failed ones are forgotten so the next call tries again.
 *
 * Only URL references are indexed on disk (`refs/`), so a later process skips
 * the download. File references are re-read by every new instance and
 * addressed by their current bytes.
 */
export class AssetCache {
  private readonly store: AssetStore
  private readonly fetcher: AssetFetcher
  private readonly validate: AssetValidator
  private readonly refresh: boolean
  private readonly entries = new Map<string, Promise<CachedAsset>>()
  private readonly counters: CacheStats = { hits: 0, misses: 0, fetches: 0, bytesFetched: 0, failures: 0 }

  constructor(options: AssetCacheOptions) {
    this.store = new AssetStore(options.root)
    this.fetcher = options.fetcher
    this.validate = options.validate ?? validateAsset
    this.refresh = options.refresh ?? false
  }

  get root(): string {
    return this.store.root
  }

  async getOrFetch(reference: AssetReference, kind: AssetKind, signal?: AbortSignal): Promise<CachedAsset> {
    const key = reference.type === 'bytes' ? `bytes:${sha256Hex(reference.bytes)}` : referenceKey(reference)
    const entryKey = `${kind}|${key}`

    const existing = this.entries.get(entryKey)
    if (existing) {
      this.counters.hits++
      return existing
    }

    const pending = this.load(reference, key, kind, signal)
    this.entries.set(entryKey, pending)
    try {
      return await pending
    } catch (err: unknown) {
      this.entries.delete(entryKey)
      this.counters.failures++
      throw err
    }
  }

  /** Whether an object with this digest is stored on disk. */
  async has(digest: string): Promise<boolean> {
    return this.store.hasObject(digest)
  }

  stats(): CacheStats {
    return { ...this.counters }
  }

  /** Re-hash every stored object. With `remove`, corrupt objects are deleted. */
  async verify(options: { remove?: boolean } = {}): Promise<VerifyResult> {
    const digests = await this.store.listObjects()
    const corrupt: string[] = []
    let removed = 0

    for (const digest of digests) {
      const bytes = await this.store.readObject(digest)
      if (bytes && sha256Hex(bytes) === digest) continue
      corrupt.push(digest)
      logger.warn(`Cache object ${digest} does not match its digest`)
      if (options.remove) {
        await removeFile(this.store.objectPath(digest))
        removed++
      }
    }

    return { checked: digests.length, corrupt, removed }
  }

  // ── Internals ──────────────────────────────────────────────────────────────

  private async load(reference: AssetReference, key: string, kind: AssetKind, signal?: AbortSignal): Promise<CachedAsset> {
    const source = describeReference(reference)

    if (reference.type === 'bytes') {
      const digest = sha256Hex(reference.bytes)
      await this.validate(reference.bytes, kind, source)
      await this.persist(digest, reference.bytes, source)
      return { digest, bytes: reference.bytes, kind, source }
    }

    // Local files are always read again: their bytes are what gets addressed.
    const indexed = reference.type === 'url'
    if (indexed && !this.refresh) {
      const cached = await this.lookup(key)
      if (cached) {
        this.counters.hits++
        logger.debug(`Cache hit ${cached.digest.slice(0, 12)} for ${source}`)
        await this.validate(cached.bytes, kind, source)
        return { digest: cached.digest, bytes: cached.bytes, kind, source }
      }
    }

    this.counters.misses++
    this.counters.fetches++
    let bytes: Buffer
    try {
      bytes = await this.fetcher.fetch(reference, signal)
    } catch (err: unknown) {
      if (isPipelineError(err)) throw err
      throw new FetchFailedError(`${source}: ${errorMessage(err)}`, { cause: err })
    }
    this.counters.bytesFetched += bytes.length

    await this.validate(bytes, kind, source)
    const digest = sha256Hex(bytes)
    await this.persist(digest, bytes, source)
    if (indexed) {
      try {
        await this.store.writeRef(key, digest)
      } catch (err: unknown) {
        throw new FetchFailedError(`${source}: cannot index cached asset: ${errorMessage(err)}`, { cause: err })
      }
    }
    logger.debug(`Cached ${source} as ${digest.slice(0, 12)} (${bytes.length} bytes)`)
    return { digest, bytes, kind, source }
  }

  /** Stored bytes for a reference key, when the index points at an intact object. */
  private async lookup(key: string): Promise<{ digest: string; bytes: Buffer } | undefined> {
    const digest = await this.store.readRef(key)
    if (!digest) return undefined
    const bytes = await this.store.readObject(digest)
    if (!bytes) return undefined
    if (sha256Hex(bytes) !== digest) {
      logger.warn(`Cache object ${digest} is corrupt, fetching again`)
      return undefined
    }
    return { digest, bytes }
  }

  private async persist(digest: string, bytes: Buffer, source: string): Promise<void> {
    try {
      const stored = await this.store.readObject(digest)
      if (!stored) {
        await this.store.writeObject(digest, bytes)
      } else if (sha256Hex(stored) !== digest) {
        await this.store.repairObject(digest, bytes)
      }
    } catch (err: unknown) {
      throw new FetchFailedError(`${source}: cannot store cached asset: ${errorMessage(err)}`, { cause: err })
    }
  }
}
