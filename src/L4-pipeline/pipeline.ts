import logger, { sanitizeForLog } from '../L1-infra/logger/configLogger.js'
import type { AssetCache } from '../L3-services/assetCache/assetCache.js'
import type { FrameCompositor } from '../L3-services/frameCompositor/frameCompositor.js'
import type { SequenceEncoder } from '../L3-services/sequenceEncoder/sequenceEncoder.js'
import type { ContentSource } from '../L3-services/contentSource/manifestContentSource.js'
import type {
  AssetReference,
  ContentUnit,
  Frame,
  PipelineState,
  ResolvedAssets,
  RunError,
  RunReport,
  SkippedUnit,
  VideoArtifact,
} from '../L0-pure/types/index.js'
import { WorkerPool } from '../L0-pure/concurrency/workerPool.js'
import {
  CancelledError,
  ConfigError,
  EncodingFailedError,
  PipelineError,
  errorMessage,
  isPipelineError,
  throwIfCancelled,
} from '../L0-pure/errors/pipelineErrors.js'
import type { PipelineErrorKind } from '../L0-pure/errors/pipelineErrors.js'

// ── Types ────────────────────────────────────────────────────────────────────

/** Collaborators of a run. Each is an explicit object; nothing is global. */
export interface PipelineDeps {
  source: ContentSource
  cache: Pick<AssetCache, 'getOrFetch'>
  compositor: Pick<FrameCompositor, 'compose'>
  encoder: Pick<SequenceEncoder, 'encode'>
}

export interface PipelineOptions {
  outputPath: string
  /** Font used for every unit with text. Required when any unit has text. */
  font?: AssetReference
  /** Units resolving assets at the same time */
  concurrency: number
  /** Fail the run on the first unit error instead of skipping the unit */
  strict: boolean
  /** Seconds added to the first frame */
  coverSeconds?: number
  /** Seconds added to the last frame */
  endingSeconds?: number
  signal?: AbortSignal
  onStateChange?: (state: PipelineState) => void
}

type Resolution =
  | { ok: true; assets: ResolvedAssets }
  | { ok: false; error: PipelineError }

// ── Helpers ──────────────────────────────────────────────────────────────────

function describeState(state: PipelineState): string {
  switch (state.name) {
    case 'Resolving':
    case 'Composing':
      return `${state.name}(${state.unitIndex})`
    case 'Failed':
      return `Failed(${state.reason.kind})`
    default:
      return state.name
  }
}

/** Normalize anything thrown inside a stage to a PipelineError of that stage's kind. */
function asPipelineError(err: unknown, kind: PipelineErrorKind, unitIndex?: number): PipelineError {
  if (isPipelineError(err)) {
    return unitIndex !== undefined && err.unitIndex === undefined ? err.forUnit(unitIndex) : err
  }
  return new PipelineError(kind, errorMessage(err), { cause: err, unitIndex })
}

function hasText(unit: ContentUnit): boolean {
  return unit.kind === 'text' || unit.kind === 'text+image'
}

/** Extend the first and last frame by the cover and ending holds. */
export function applyHolds(frames: Frame[], coverSeconds: number, endingSeconds: number): Frame[] {
  if (frames.length === 0) return frames
  const held = [...frames]
  held[0] = { ...held[0], duration: held[0].duration + coverSeconds }
  const last = held.length - 1
  held[last] = { ...held[last], duration: held[last].duration + endingSeconds }
  return held
}

// ── Orchestrator ─────────────────────────────────────────────────────────────

/**
 * Run one compilation: fetch units, resolve their assets on a bounded pool,
 * compose frames in unit order, and encode them.
 *
 * Per-unit failures skip the unit unless `strict` is set. Encoding failures and
 * cancellation always fail the run. Invalid input (a manifest that does not
 * validate, text without a font) throws `ConfigError` instead of reporting.
 */
export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<RunReport> {
  const start = Date.now()
  const skipped: SkippedUnit[] = []
  const { signal } = options

  // Stops outstanding resolutions once the run is over, whichever way it ended.
  const resolutionAbort = new AbortController()
  const forwardAbort = (): void => resolutionAbort.abort()
  signal?.addEventListener('abort', forwardAbort, { once: true })

  const run: { state: PipelineState } = { state: { name: 'Idle' } }
  const transition = (next: PipelineState): void => {
    logger.debug(`Pipeline ${describeState(run.state)} → ${describeState(next)}`)
    run.state = next
    options.onStateChange?.(next)
  }
  options.onStateChange?.(run.state)

  const resolveUnit = async (unit: ContentUnit, index: number): Promise<Resolution> => {
    try {
      throwIfCancelled(resolutionAbort.signal, index)
      const assets: ResolvedAssets = {}
      if (unit.kind === 'image' || unit.kind === 'text+image') {
        assets.image = await deps.cache.getOrFetch(unit.image, 'image', resolutionAbort.signal)
      }
      if (hasText(unit) && options.font) {
        assets.font = await deps.cache.getOrFetch(options.font, 'font', resolutionAbort.signal)
      }
      return { ok: true, assets }
    } catch (err: unknown) {
      return { ok: false, error: asPipelineError(err, 'FetchFailed', index) }
    }
  }

  const recordUnitFailure = (error: PipelineError, index: number): void => {
    if (!error.perUnit || options.strict) {
      throw error.unitIndex === undefined ? error.forUnit(index) : error
    }
    skipped.push({ index, kind: error.kind, message: error.message })
    logger.warn(`Skipping unit ${index} (${error.kind}): ${sanitizeForLog(error.message)}`)
  }

  try {
    transition({ name: 'FetchingUnits' })
    throwIfCancelled(signal)
    let units: readonly ContentUnit[]
    try {
      units = Object.freeze(await deps.source.fetchUnits())
    } catch (err: unknown) {
      if (err instanceof ConfigError) throw err
      throw asPipelineError(err, 'FetchFailed')
    }
    if (!options.font && units.some(hasText)) {
      throw new ConfigError('Text units need a font: pass --font or set "font" in the config file')
    }
    logger.info(`Compiling ${units.length} units (concurrency ${options.concurrency}${options.strict ? ', strict' : ''})`)

    const pool = new WorkerPool(options.concurrency)
    const resolutions = units.map((unit, index) => pool.run(() => resolveUnit(unit, index)))

    let frames: Frame[] = []
    for (const [index, unit] of units.entries()) {
      throwIfCancelled(signal, index)
      transition({ name: 'Resolving', unitIndex: index })
      const resolution = await resolutions[index]
      if (!resolution.ok) {
        recordUnitFailure(resolution.error, index)
        continue
      }

      throwIfCancelled(signal, index)
      transition({ name: 'Composing', unitIndex: index })
      try {
        const composed = await deps.compositor.compose(unit, resolution.assets)
        frames.push(...composed)
        logger.debug(`Unit ${index} (${unit.kind}) → ${composed.length} frame(s)`)
      } catch (err: unknown) {
        recordUnitFailure(asPipelineError(err, 'CompositionFailed', index), index)
      }
    }

    if (frames.length === 0) {
      throw new EncodingFailedError(
        units.length === 0 ? 'No content units to encode' : `No frames to encode: all ${units.length} units were skipped`,
      )
    }
    frames = applyHolds(frames, options.coverSeconds ?? 0, options.endingSeconds ?? 0)

    throwIfCancelled(signal)
    transition({ name: 'Encoding' })
    let artifact: VideoArtifact
    try {
      artifact = await deps.encoder.encode(frames, options.outputPath, signal)
    } catch (err: unknown) {
      throw asPipelineError(err, 'EncodingFailed')
    }

    transition({ name: 'Finalized' })
    const elapsedMs = Date.now() - start
    logger.info(`Pipeline finalized in ${elapsedMs}ms: ${frames.length} frames, ${skipped.length} skipped → ${artifact.path}`)
    return { state: 'finalized', artifact, frameCount: frames.length, skipped, elapsedMs }
  } catch (err: unknown) {
    if (err instanceof ConfigError) throw err

    const fallbackKind: PipelineErrorKind = run.state.name === 'Composing' ? 'CompositionFailed'
      : run.state.name === 'Encoding' ? 'EncodingFailed'
      : 'FetchFailed'
    const failure = signal?.aborted && !(err instanceof CancelledError)
      ? new CancelledError('Run cancelled', { cause: err })
      : asPipelineError(err, fallbackKind)

    const reason: RunError = { kind: failure.kind, message: failure.message }
    if (failure.unitIndex !== undefined) reason.unitIndex = failure.unitIndex
    transition({ name: 'Failed', reason })

    const elapsedMs = Date.now() - start
    const where = reason.unitIndex !== undefined ? ` at unit ${reason.unitIndex}` : ''
    logger.error(`Pipeline failed after ${elapsedMs}ms${where} (${reason.kind}): ${sanitizeForLog(reason.message)}`)
    return { state: 'failed', error: reason, skipped, elapsedMs }
  } finally {
    signal?.removeEventListener('abort', forwardAbort)
    resolutionAbort.abort()
  }
}
