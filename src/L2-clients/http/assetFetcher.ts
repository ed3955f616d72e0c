import { fetchRaw } from '../../L1-infra/http/httpClient.js'
import { readFileBuffer } from '../../L1-infra/fileSystem/fileSystem.js'
import { resolve } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AssetReference } from '../../L0-pure/types/index.js'
import {
  CancelledError,
  FetchFailedError,
  errorMessage,
  throwIfCancelled,
} from '../../L0-pure/errors/pipelineErrors.js'

// ── Types ──────────────────────────────────────────────────────────────

/** Retrieves the raw bytes behind an asset reference. */
export interface AssetFetcher {
  fetch(reference: AssetReference, signal?: AbortSignal): Promise<Buffer>
}

export interface HttpAssetFetcherOptions {
  /** Per-attempt timeout for URL downloads */
  timeoutMs: number
  /** Extra attempts after the first for network errors, 5xx and 429 */
  retries: number
  /** Base delay between attempts, doubled each retry */
  retryDelayMs?: number
  /** Directory relative file paths resolve against */
  baseDir?: string
}

class RetryableError extends Error {}

/** Wait `ms` between attempts; an abort ends the wait early. */
function backoff(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}

// ── Fetcher ────────────────────────────────────────────────────────────

/**
 * Fetches `url` references over HTTP(S) and reads `file` references from disk.
 * `bytes` references are returned as-is. Every failure surfaces as
 * `FetchFailedError`, or `CancelledError` once `signal` aborts.
 */
export class HttpAssetFetcher implements AssetFetcher {
  private readonly retryDelayMs: number

  constructor(private readonly options: HttpAssetFetcherOptions) {
    this.retryDelayMs = options.retryDelayMs ?? 500
  }

  async fetch(reference: AssetReference, signal?: AbortSignal): Promise<Buffer> {
    throwIfCancelled(signal)
    switch (reference.type) {
      case 'bytes':
        return reference.bytes
      case 'file':
        return this.readFile(reference.path)
      case 'url':
        return this.download(reference.url, signal)
    }
  }

  private async readFile(filePath: string): Promise<Buffer> {
    const fullPath = this.options.baseDir ? resolve(this.options.baseDir, filePath) : resolve(filePath)
    try {
      return await readFileBuffer(fullPath)
    } catch (err: unknown) {
      throw new FetchFailedError(`Cannot read ${fullPath}: ${errorMessage(err)}`, { cause: err })
    }
  }

  private async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    const attempts = this.options.retries + 1

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.attempt(url, signal)
      } catch (err: unknown) {
        if (signal?.aborted) throw new CancelledError()
        if (!(err instanceof RetryableError)) throw err
        if (attempt === attempts) {
          throw new FetchFailedError(`${url}: ${err.message} (after ${attempts} attempts)`, { cause: err })
        }
        const delay = this.retryDelayMs * 2 ** (attempt - 1)
        logger.warn(`Fetch ${url} failed: ${err.message}, retrying in ${delay}ms (attempt ${attempt}/${attempts})`)
        await backoff(delay, signal)
        throwIfCancelled(signal)
      }
    }

    // Unreachable: the last attempt either returns or throws
    throw new FetchFailedError(`${url}: request failed`)
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<Buffer> {
    const timeout = AbortSignal.timeout(this.options.timeoutMs)
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout

    logger.debug(`GET ${url}`)
    let response: Response
    try {
      response = await fetchRaw(url, { signal: combined, redirect: 'follow' })
    } catch (err: unknown) {
      if (timeout.aborted) throw new RetryableError(`timed out after ${this.options.timeoutMs}ms`)
      throw new RetryableError(errorMessage(err))
    }

    if (response.status === 429 || response.status >= 500) {
      throw new RetryableError(`HTTP ${response.status}`)
    }
    if (!response.ok) {
      throw new FetchFailedError(`${url}: HTTP ${response.status}`)
    }

    try {
      return Buffer.from(await response.arrayBuffer())
    } catch (err: unknown) {
      if (timeout.aborted) throw new RetryableError(`timed out after ${this.options.timeoutMs}ms reading body`)
      throw new RetryableError(`body read failed: ${errorMessage(err)}`)
    }
  }
}
