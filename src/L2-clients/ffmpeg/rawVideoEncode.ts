import { createFFmpeg } from './ffmpeg.js'
import { PassThrough } from '../../L1-infra/stream/stream.js'
import logger from '../../L1-infra/logger/configLogger.js'

export interface RawVideoOptions {
  width: number
  height: number
  fps: number
  /** x264 constant rate factor */
  crf: number
  /** x264 preset */
  preset: string
}

/** A running FFmpeg process fed with raw RGBA frames on stdin. */
export interface RawVideoSession {
  /** Queue one frame's pixels, waiting for FFmpeg to catch up when its input is full. */
  write(pixels: Buffer): Promise<void>
  /** Close the input and wait for FFmpeg to finish the file. */
  finish(): Promise<void>
  /** Stop FFmpeg immediately. */
  kill(): void
}

// Bit-exact, metadata-free output so identical frames give identical files.
const OUTPUT_OPTIONS = [
  '-pix_fmt', 'yuv420p',
  '-an',
  '-fflags', '+bitexact',
  '-flags:v', '+bitexact',
  '-map_metadata', '-1',
  '-movflags', '+faststart',
]

function stderrTail(stderr: unknown): string {
  if (typeof stderr !== 'string' || !stderr.trim()) return ''
  const lines = stderr.trim().split('\n')
  return `\n${lines.slice(-5).join('\n')}`
}

/**
 * Start encoding raw `rgba` video of a fixed size and rate into an H.264 MP4 at
 * `outputPath`. Each `write()` is exactly one frame at `1 / fps` seconds.
 */
export function startRawVideoEncode(outputPath: string, options: RawVideoOptions): RawVideoSession {
  const input = new PassThrough()
  let exited = false
  let exitError: Error | undefined

  const command = createFFmpeg(input)
    .inputFormat('rawvideo')
    .inputOptions([
      '-pixel_format', 'rgba',
      '-video_size', `${options.width}x${options.height}`,
      '-framerate', String(options.fps),
    ])
    .videoCodec('libx264')
    .outputOptions(['-preset', options.preset, '-crf', String(options.crf), ...OUTPUT_OPTIONS])
    .format('mp4')
    .output(outputPath)

  const finished = new Promise<void>((resolve, reject) => {
    command
      .on('start', (commandLine: string) => {
        logger.debug(`FFmpeg started: ${commandLine}`)
      })
      .on('end', () => {
        exited = true
        resolve()
      })
      .on('error', (err: Error, _stdout: unknown, stderr: unknown) => {
        exited = true
        exitError = new Error(`FFmpeg failed: ${err.message}${stderrTail(stderr)}`)
        reject(exitError)
      })
  })
  // The failure itself surfaces through write() and finish().
  finished.catch((err: unknown) => {
    logger.debug(`FFmpeg exited with error: ${err instanceof Error ? err.message : String(err)}`)
  })

  command.run()

  return {
    async write(pixels) {
      if (exited) {
        throw exitError ?? new Error('FFmpeg exited before all frames were written')
      }
      if (!input.write(pixels)) {
        await Promise.race([new Promise<void>((resolve) => input.once('drain', resolve)), finished])
      }
    },
    async finish() {
      input.end()
      await finished
    },
    kill() {
      if (!exited) command.kill('SIGKILL')
      input.destroy()
    },
  }
}
