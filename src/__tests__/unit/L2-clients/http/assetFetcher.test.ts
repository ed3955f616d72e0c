import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { join } from 'path'

const mockFetch = vi.fn()
vi.stubGlobal('fetch', mockFetch)

import logger from '../../../../L1-infra/logger/configLogger.js'
import { HttpAssetFetcher } from '../../../../L2-clients/http/assetFetcher.js'
import { CancelledError, FetchFailedError } from '../../../../L0-pure/errors/pipelineErrors.js'

const ASSET_URL = 'https://example.com/a.png'

function okResponse(bytes: number[]): Response {
  return new Response(new Uint8Array(bytes), { status: 200 })
}

describe('HttpAssetFetcher', () => {
  let fetcher: HttpAssetFetcher

  beforeEach(() => {
    vi.clearAllMocks()
    fetcher = new HttpAssetFetcher({ timeoutMs: 1000, retries: 2, retryDelayMs: 0 })
  })

  describe('bytes references', () => {
    it('returns inline bytes without touching the network', async () => {
      const bytes = Buffer.from([9, 8, 7])
      expect(await fetcher.fetch({ type: 'bytes', bytes })).toBe(bytes)
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('file references', () => {
    let dir: string

    beforeEach(async () => {
      dir = await fsp.mkdtemp(join(os.tmpdir(), 'framecast-fetch-test-'))
    })

    afterEach(async () => {
      await fsp.rm(dir, { recursive: true, force: true })
    })

    it('reads paths relative to the base directory', async () => {
      await fsp.writeFile(join(dir, 'pic.png'), Buffer.from([1, 2, 3]))
      const local = new HttpAssetFetcher({ timeoutMs: 1000, retries: 0, baseDir: dir })

      expect([...await local.fetch({ type: 'file', path: 'pic.png' })]).toEqual([1, 2, 3])
    })

    it('reports a missing file as FetchFailed', async () => {
      const missing = join(dir, 'missing.png')
      const result = fetcher.fetch({ type: 'file', path: missing })

      await expect(result).rejects.toBeInstanceOf(FetchFailedError)
      await expect(result).rejects.toThrow(`Cannot read ${missing}: File not found: ${missing}`)
    })
  })

  describe('url references', () => {
    it('downloads the body, following redirects', async () => {
      mockFetch.mockResolvedValueOnce(okResponse([1, 2, 3, 4]))

      const bytes = await fetcher.fetch({ type: 'url', url: ASSET_URL })

      expect([...bytes]).toEqual([1, 2, 3, 4])
      expect(mockFetch).toHaveBeenCalledTimes(1)
      const [url, opts] = mockFetch.mock.calls[0]
      expect(url).toBe(ASSET_URL)
      expect(opts.redirect).toBe('follow')
      expect(opts.signal).toBeInstanceOf(AbortSignal)
    })

    it('does not retry a 404', async () => {
      mockFetch.mockResolvedValue(new Response('missing', { status: 404 }))

      const result = fetcher.fetch({ type: 'url', url: ASSET_URL })

      await expect(result).rejects.toBeInstanceOf(FetchFailedError)
      await expect(result).rejects.toThrow(`${ASSET_URL}: HTTP 404`)
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('retries server errors and rate limits', async () => {
      mockFetch
        .mockResolvedValueOnce(new Response('oops', { status: 503 }))
        .mockResolvedValueOnce(new Response('slow down', { status: 429 }))
        .mockResolvedValueOnce(okResponse([5]))

      expect([...await fetcher.fetch({ type: 'url', url: ASSET_URL })]).toEqual([5])
      expect(mockFetch).toHaveBeenCalledTimes(3)
      expect(logger.warn).toHaveBeenCalledTimes(2)
    })

    it('gives up after the configured retries', async () => {
      mockFetch.mockRejectedValue(new TypeError('fetch failed'))

      await expect(fetcher.fetch({ type: 'url', url: ASSET_URL })).rejects.toThrow(
        `${ASSET_URL}: fetch failed (after 3 attempts)`,
      )
      expect(mockFetch).toHaveBeenCalledTimes(3)
    })

    it('times out a request that never answers', async () => {
      mockFetch.mockImplementation((_url: string, opts: RequestInit) => new Promise((_resolve, reject) => {
        opts.signal?.addEventListener('abort', () => reject(new Error('aborted')))
      }))
      const impatient = new HttpAssetFetcher({ timeoutMs: 20, retries: 0 })

      await expect(impatient.fetch({ type: 'url', url: ASSET_URL })).rejects.toThrow(
        `${ASSET_URL}: timed out after 20ms (after 1 attempts)`,
      )
    })

    it('stops with Cancelled once the run is aborted', async () => {
      const controller = new AbortController()
      mockFetch.mockImplementation((_url: string, opts: RequestInit) => new Promise((_resolve, reject) => {
        opts.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        controller.abort()
      }))

      await expect(fetcher.fetch({ type: 'url', url: ASSET_URL }, controller.signal)).rejects.toBeInstanceOf(CancelledError)
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('stops waiting between attempts as soon as the run is aborted', async () => {
      const controller = new AbortController()
      mockFetch.mockResolvedValue(new Response('oops', { status: 503 }))
      const patient = new HttpAssetFetcher({ timeoutMs: 1000, retries: 2, retryDelayMs: 60_000 })
      setTimeout(() => controller.abort(), 20)

      const started = Date.now()
      await expect(patient.fetch({ type: 'url', url: ASSET_URL }, controller.signal)).rejects.toBeInstanceOf(CancelledError)
      expect(Date.now() - started).toBeLessThan(5_000)
      expect(mockFetch).toHaveBeenCalledTimes(1)
    })

    it('does not start when the signal is already aborted', async () => {
      const controller = new AbortController()
      controller.abort()

      await expect(fetcher.fetch({ type: 'url', url: ASSET_URL }, controller.signal)).rejects.toBeInstanceOf(CancelledError)
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })
})
