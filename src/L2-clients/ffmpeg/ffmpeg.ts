import type { Readable } from '../../L1-infra/stream/stream.js'
import { fluentFfmpeg as ffmpegLib } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { FfmpegCommand } from '../../L1-infra/ffmpeg/ffmpeg.js'
import { spawnCommand } from '../../L1-infra/process/process.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(): string {
  const config = getConfig()
  if (config.FFMPEG_PATH && config.FFMPEG_PATH !== 'ffmpeg') {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${config.FFMPEG_PATH}`)
    return config.FFMPEG_PATH
  }
  logger.debug('FFmpeg: using ffmpeg from system PATH')
  return 'ffmpeg'
}

/** Create a pre-configured fluent-ffmpeg instance. */
export function createFFmpeg(input?: string | Readable): FfmpegCommand {
  const cmd = input ? ffmpegLib(input) : ffmpegLib()
  cmd.setFfmpegPath(getFFmpegPath())
  return cmd
}

/**
 * First line of `ffmpeg -version`, or `null` when the binary cannot be run.
 * Used by `doctor` to report which FFmpeg a run would use.
 */
export function ffmpegVersion(): string | null {
  const result = spawnCommand(getFFmpegPath(), ['-version'], { timeout: 10_000 })
  if (result.error || result.status !== 0) {
    logger.debug(`FFmpeg version check failed: ${result.error?.message ?? `exit code ${result.status}`}`)
    return null
  }
  return result.stdout.split('\n')[0]?.trim() || null
}

export type { FfmpegCommand }
