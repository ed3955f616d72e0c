/**
 * Error taxonomy of a pipeline run.
 *
 * Per-unit kinds (`FetchFailed`, `DecodeFailed`, `CompositionFailed`) are
 * recoverable by skipping the unit; `EncodingFailed` and `Cancelled` always end
 * the run.
 */

export type PipelineErrorKind =
  | 'FetchFailed'
  | 'DecodeFailed'
  | 'CompositionFailed'
  | 'EncodingFailed'
  | 'Cancelled'

const PER_UNIT_KINDS: ReadonlySet<PipelineErrorKind> = new Set([
  'FetchFailed',
  'DecodeFailed',
  'CompositionFailed',
])

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind
  readonly unitIndex?: number

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown; unitIndex?: number }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = kind
    this.kind = kind
    this.unitIndex = options?.unitIndex
  }

  /** True for kinds that only affect a single content unit. */
  get perUnit(): boolean {
    return PER_UNIT_KINDS.has(this.kind)
  }

  /** Copy of this error tagged with the unit it belongs to. */
  forUnit(unitIndex: number): PipelineError {
    return new PipelineError(this.kind, this.message, { cause: this.cause, unitIndex })
  }
}

export class FetchFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; unitIndex?: number }) {
    super('FetchFailed', message, options)
  }
}

export class DecodeFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; unitIndex?: number }) {
    super('DecodeFailed', message, options)
  }
}

export class CompositionFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; unitIndex?: number }) {
    super('CompositionFailed', message, options)
  }
}

export class EncodingFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown; unitIndex?: number }) {
    super('EncodingFailed', message, options)
  }
}

export class CancelledError extends PipelineError {
  constructor(message = 'Run cancelled', options?: { cause?: unknown; unitIndex?: number }) {
    super('Cancelled', message, options)
  }
}

/** Raised for invalid configuration or manifests, before any run starts. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** Throw `CancelledError` if the signal has been aborted. */
export function throwIfCancelled(signal: AbortSignal | undefined, unitIndex?: number): void {
  if (signal?.aborted) {
    throw new CancelledError('Run cancelled', { unitIndex })
  }
}
