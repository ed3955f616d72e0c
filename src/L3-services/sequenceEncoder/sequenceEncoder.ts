import { startRawVideoEncode } from '../../L2-clients/ffmpeg/rawVideoEncode.js'
import { ffmpegVersion } from '../../L2-clients/ffmpeg/ffmpeg.js'
import type { RawVideoSession } from '../../L2-clients/ffmpeg/rawVideoEncode.js'
import {
  ensureDirectory,
  getFileStats,
  removeFile,
  renameFile,
  tempPathBeside,
} from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { Frame, FrameTiming, VideoArtifact } from '../../L0-pure/types/index.js'
import { quantizeDurations, ticksToSeconds, totalTicks } from '../../L0-pure/timing/ticks.js'
import {
  CancelledError,
  EncodingFailedError,
  errorMessage,
  isPipelineError,
  throwIfCancelled,
} from '../../L0-pure/errors/pipelineErrors.js'

export interface EncoderSettings {
  fps: number
  crf: number
  preset: string
}

/**
 * Encodes an ordered frame sequence into one H.264 / yuv420p MP4.
 *
 * Each frame is held for a whole number of `1 / fps` ticks (see
 * `quantizeDurations`). The file appears at `outputPath` only once FFmpeg has
 * finished; any failure or cancellation leaves nothing behind.
 */
export class SequenceEncoder {
  constructor(readonly settings: EncoderSettings) {}

  async encode(frames: readonly Frame[], outputPath: string, signal?: AbortSignal): Promise<VideoArtifact> {
    const { width, height } = checkFrames(frames)
    let timings: FrameTiming[]
    try {
      timings = quantizeDurations(frames.map((f) => f.duration), this.settings.fps)
    } catch (err: unknown) {
      throw new EncodingFailedError(errorMessage(err), { cause: err })
    }
    throwIfCancelled(signal)

    const ticks = totalTicks(timings)
    logger.info(`Encoding ${frames.length} frames (${ticks} ticks at ${this.settings.fps} fps) → ${outputPath}`)

    await ensureDirectory(dirname(outputPath))
    const tempPath = tempPathBeside(outputPath)
    let session: RawVideoSession | undefined
    const onAbort = (): void => session?.kill()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      session = startRawVideoEncode(tempPath, { width, height, ...this.settings })
      for (const timing of timings) {
        throwIfCancelled(signal)
        const frame = frames[timing.index]
        for (let t = 0; t < timing.ticks; t++) {
          await session.write(frame.pixels)
        }
      }
      throwIfCancelled(signal)
      await session.finish()
      await renameFile(tempPath, outputPath)
    } catch (err: unknown) {
      session?.kill()
      await removeFile(tempPath)
      if (signal?.aborted) {
        logger.warn(`Encoding cancelled; removed ${tempPath}`)
        throw err instanceof CancelledError ? err : new CancelledError('Run cancelled during encoding', { cause: err })
      }
      if (isPipelineError(err)) throw err
      throw new EncodingFailedError(errorMessage(err), { cause: err })
    } finally {
      signal?.removeEventListener('abort', onAbort)
    }

    const { size } = await getFileStats(outputPath)
    logger.info(`Encoded ${outputPath} (${size} bytes, ${ticksToSeconds(ticks, this.settings.fps).toFixed(2)}s)`)

    return {
      path: outputPath,
      container: 'mp4',
      codec: 'h264',
      pixelFormat: 'yuv420p',
      width,
      height,
      fps: this.settings.fps,
      frames: timings,
      totalTicks: ticks,
      duration: ticksToSeconds(ticks, this.settings.fps),
      bytes: size,
    }
  }
}

/** All frames must share the first frame's size and carry a full RGBA buffer. */
function checkFrames(frames: readonly Frame[]): { width: number; height: number } {
  if (frames.length === 0) {
    throw new EncodingFailedError('Cannot encode a video with no frames')
  }
  const { width, height } = frames[0]
  if (width % 2 !== 0 || height % 2 !== 0) {
    throw new EncodingFailedError(`Frame size ${width}x${height} is not even; yuv420p needs even dimensions`)
  }
  frames.forEach((frame, index) => {
    if (frame.width !== width || frame.height !== height) {
      throw new EncodingFailedError(`Frame ${index} is ${frame.width}x${frame.height}, expected ${width}x${height}`)
    }
    if (frame.pixels.length !== width * height * 4) {
      throw new EncodingFailedError(
        `Frame ${index} has ${frame.pixels.length} bytes of pixels, expected ${width * height * 4}`,
      )
    }
  })
  return { width, height }
}

/** Version line of the FFmpeg binary encodes would use, or `null` when it cannot run. */
export function encoderVersion(): string | null {
  return ffmpegVersion()
}
