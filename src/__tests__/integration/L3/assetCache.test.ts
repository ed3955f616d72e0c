/**
 * L3 Integration Test: asset cache over real files
 *
 * Mock boundary: none (logger is silenced by setup.ts)
 * Real code:     L2 HttpAssetFetcher (file refs), L3 AssetCache, AssetStore,
 *                sharp-backed validation, on-disk object store
 *
 * Validates that stored objects are shared across cache instances, that edited
 * files are picked up, that undecodable bytes never reach the store, and that
 * corrupt objects are repaired.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { join } from 'path'
import { sharp } from '../../../L1-infra/image/image.js'
import { sha256Hex } from '../../../L1-infra/hash/hash.js'
import { HttpAssetFetcher } from '../../../L2-clients/http/assetFetcher.js'
import { AssetCache } from '../../../L3-services/assetCache/assetCache.js'
import type { AssetReference } from '../../../L0-pure/types/index.js'
import { DecodeFailedError, FetchFailedError } from '../../../L0-pure/errors/pipelineErrors.js'

const RED_PNG: AssetReference = { type: 'file', path: 'red.png' }

describe('L3 Integration: AssetCache', () => {
  let dir: string
  let cacheRoot: string
  let pngBytes: Buffer
  let digest: string

  function newCache(): AssetCache {
    return new AssetCache({
      root: cacheRoot,
      fetcher: new HttpAssetFetcher({ timeoutMs: 1000, retries: 0, baseDir: dir }),
    })
  }

  function objectPath(hex: string): string {
    return join(cacheRoot, 'objects', hex.slice(0, 2), hex)
  }

  beforeEach(async () => {
    dir = await fsp.mkdtemp(join(os.tmpdir(), 'framecast-cache-int-'))
    cacheRoot = join(dir, '.cache')
    pngBytes = await sharp({ create: { width: 4, height: 2, channels: 3, background: { r: 255, g: 0, b: 0 } } })
      .png()
      .toBuffer()
    digest = sha256Hex(pngBytes)
    await fsp.writeFile(join(dir, 'red.png'), pngBytes)
    await fsp.writeFile(join(dir, 'notes.txt'), 'hello')
  })

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true })
  })

  it('stores a file asset under its digest', async () => {
    const cache = newCache()
    const asset = await cache.getOrFetch(RED_PNG, 'image')

    expect(asset.digest).toBe(digest)
    expect(asset.source).toBe('red.png')
    expect(asset.bytes.equals(pngBytes)).toBe(true)
    expect(await cache.has(digest)).toBe(true)
    expect((await fsp.readFile(objectPath(digest))).equals(pngBytes)).toBe(true)
    expect(cache.stats()).toEqual({ hits: 0, misses: 1, fetches: 1, bytesFetched: pngBytes.length, failures: 0 })
  })

  it('reads the file again in a second cache instance and reuses the stored object', async () => {
    await newCache().getOrFetch(RED_PNG, 'image')
    const stored = await fsp.stat(objectPath(digest))

    const second = newCache()
    const asset = await second.getOrFetch(RED_PNG, 'image')

    expect(asset.digest).toBe(digest)
    expect(second.stats()).toMatchObject({ hits: 0, misses: 1, fetches: 1 })
    expect((await fsp.stat(objectPath(digest))).mtimeMs).toBe(stored.mtimeMs)
  })

  it('picks up an edited file in the next run', async () => {
    await newCache().getOrFetch(RED_PNG, 'image')
    const bluePng = await sharp({ create: { width: 4, height: 2, channels: 3, background: { r: 0, g: 0, b: 255 } } })
      .png()
      .toBuffer()
    await fsp.writeFile(join(dir, 'red.png'), bluePng)

    const asset = await newCache().getOrFetch(RED_PNG, 'image')

    expect(asset.digest).toBe(sha256Hex(bluePng))
    expect(asset.bytes.equals(bluePng)).toBe(true)
    expect(await fsp.readdir(cacheRoot)).toEqual(['objects'])
  })

  it('rejects bytes that are not an image and stores nothing', async () => {
    const cache = newCache()

    const result = cache.getOrFetch({ type: 'file', path: 'notes.txt' }, 'image')

    await expect(result).rejects.toBeInstanceOf(DecodeFailedError)
    await expect(cache.getOrFetch({ type: 'file', path: 'notes.txt' }, 'image'))
      .rejects.toThrow(/^notes\.txt: not a decodable image/)
    expect(await cache.verify()).toEqual({ checked: 0, corrupt: [], removed: 0 })
    expect(cache.stats().failures).toBe(2)
  })

  it('reports a missing file as a fetch failure', async () => {
    const result = newCache().getOrFetch({ type: 'file', path: 'missing.png' }, 'image')

    await expect(result).rejects.toBeInstanceOf(FetchFailedError)
    await expect(newCache().getOrFetch({ type: 'file', path: 'missing.png' }, 'image'))
      .rejects.toThrow(`Cannot read ${join(dir, 'missing.png')}: `)
  })

  it('repairs a corrupt object on the next lookup', async () => {
    await newCache().getOrFetch(RED_PNG, 'image')
    await fsp.writeFile(objectPath(digest), 'garbage')

    const cache = newCache()
    const asset = await cache.getOrFetch(RED_PNG, 'image')

    expect(asset.bytes.equals(pngBytes)).toBe(true)
    expect(cache.stats()).toMatchObject({ misses: 1, fetches: 1 })
    expect((await fsp.readFile(objectPath(digest))).equals(pngBytes)).toBe(true)
  })

  it('verify finds and removes corrupt objects', async () => {
    await newCache().getOrFetch(RED_PNG, 'image')
    await fsp.writeFile(objectPath(digest), 'garbage')

    const cache = newCache()
    expect(await cache.verify()).toEqual({ checked: 1, corrupt: [digest], removed: 0 })
    expect(await cache.verify({ remove: true })).toEqual({ checked: 1, corrupt: [digest], removed: 1 })
    expect(await cache.has(digest)).toBe(false)
  })
})
