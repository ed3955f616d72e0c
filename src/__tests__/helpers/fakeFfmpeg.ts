/**
 * In-process stand-in for fluent-ffmpeg.
 *
 * Mock the L1 wrapper with it:
 *
 *   vi.mock('<path>/L1-infra/ffmpeg/ffmpeg.js', async () => {
 *     const { fakeFfmpeg } = await import('<path>/__tests__/helpers/fakeFfmpeg.js')
 *     return { fluentFfmpeg: fakeFfmpeg }
 *   })
 *
 * Instead of encoding, a run copies every byte written to its input stream
 * into the output file, so tests can assert the exact frame stream.
 */
import { writeFileSync } from 'fs'
import type { Readable } from 'stream'

export interface FakeRun {
  ffmpegPath: string
  inputFormat: string
  inputOptions: string[]
  videoCodec: string
  outputOptions: string[]
  format: string
  outputPath: string
  chunks: Buffer[]
  killed: boolean
}

export interface FakeFfmpegBehavior {
  /** Fail the run with this message on the first input chunk. */
  failWith?: string
  /** Called with every input chunk as FFmpeg reads it. */
  onChunk?: (chunk: Buffer, run: FakeRun) => void
}

export const fakeRuns: FakeRun[] = []
export const fakeBehavior: FakeFfmpegBehavior = {}

export function resetFakeFfmpeg(): void {
  fakeRuns.length = 0
  delete fakeBehavior.failWith
  delete fakeBehavior.onChunk
}

/** Everything a run received on its input. */
export function runInput(run: FakeRun): Buffer {
  return Buffer.concat(run.chunks)
}

type Handler = (...args: unknown[]) => void

class FakeFfmpegCommand {
  private readonly handlers = new Map<string, Handler>()
  private done = false
  readonly record: FakeRun = {
    ffmpegPath: '',
    inputFormat: '',
    inputOptions: [],
    videoCodec: '',
    outputOptions: [],
    format: '',
    outputPath: '',
    chunks: [],
    killed: false,
  }

  constructor(private readonly source?: string | Readable) {
    fakeRuns.push(this.record)
  }

  setFfmpegPath(path: string): this {
    this.record.ffmpegPath = path
    return this
  }

  inputFormat(format: string): this {
    this.record.inputFormat = format
    return this
  }

  inputOptions(options: string[]): this {
    this.record.inputOptions.push(...options)
    return this
  }

  videoCodec(codec: string): this {
    this.record.videoCodec = codec
    return this
  }

  outputOptions(options: string[]): this {
    this.record.outputOptions.push(...options)
    return this
  }

  format(format: string): this {
    this.record.format = format
    return this
  }

  output(path: string): this {
    this.record.outputPath = path
    return this
  }

  on(event: string, handler: Handler): this {
    this.handlers.set(event, handler)
    return this
  }

  run(): void {
    this.emit('start', `ffmpeg -f ${this.record.inputFormat} -i pipe:0 ${this.record.outputPath}`)
    const input = this.source
    if (input === undefined || typeof input === 'string') {
      setImmediate(() => this.succeed())
      return
    }
    input.on('data', (chunk: Buffer) => {
      if (this.done) return
      this.record.chunks.push(chunk)
      if (fakeBehavior.failWith !== undefined) {
        this.fail(fakeBehavior.failWith, 'Error while processing the stream')
        return
      }
      fakeBehavior.onChunk?.(chunk, this.record)
    })
    input.on('end', () => this.succeed())
  }

  kill(signal: string): void {
    this.record.killed = true
    this.fail(`ffmpeg was killed with signal ${signal}`, '')
  }

  private succeed(): void {
    if (this.done) return
    this.done = true
    writeFileSync(this.record.outputPath, runInput(this.record))
    this.emit('end')
  }

  private fail(message: string, stderr: string): void {
    if (this.done) return
    this.done = true
    this.emit('error', new Error(message), '', stderr)
  }

  private emit(event: string, ...args: unknown[]): void {
    this.handlers.get(event)?.(...args)
  }
}

export function fakeFfmpeg(source?: string | Readable): FakeFfmpegCommand {
  return new FakeFfmpegCommand(source)
}
