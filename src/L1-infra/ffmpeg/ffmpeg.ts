import fluentFfmpeg from 'fluent-ffmpeg'

export { fluentFfmpeg }
export type { FfmpegCommand } from 'fluent-ffmpeg'
