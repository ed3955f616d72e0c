import { initConfig } from '../../L1-infra/config/environment.js'
import type { AppConfig, CLIOptions } from '../../L1-infra/config/environment.js'
import logger, { popPipe, pushPipe, setVerbose } from '../../L1-infra/logger/configLogger.js'
import { basename, dirname, extname, join, resolve } from '../../L1-infra/paths/paths.js'
import { HttpAssetFetcher } from '../../L2-clients/http/assetFetcher.js'
import { AssetCache } from '../../L3-services/assetCache/assetCache.js'
import { FrameCompositor } from '../../L3-services/frameCompositor/frameCompositor.js'
import { SequenceEncoder } from '../../L3-services/sequenceEncoder/sequenceEncoder.js'
import { ManifestContentSource } from '../../L3-services/contentSource/manifestContentSource.js'
import { runPipeline } from '../../L4-pipeline/pipeline.js'
import type { AssetReference, RunReport } from '../../L0-pure/types/index.js'
import { isRemote } from '../../L0-pure/assets/references.js'

export interface RenderOptions extends CLIOptions {
  output?: string
}

/** Exit code of a cancelled run (128 + SIGINT). */
export const EXIT_CANCELLED = 130

/** `<manifest name>.mp4` beside the manifest when no output path is given. */
export function defaultOutputPath(manifestPath: string): string {
  const full = resolve(manifestPath)
  return join(dirname(full), `${basename(full, extname(full))}.mp4`)
}

function fontReference(config: AppConfig): AssetReference | undefined {
  if (!config.FONT_PATH) return undefined
  return isRemote(config.FONT_PATH)
    ? { type: 'url', url: config.FONT_PATH }
    : { type: 'file', path: resolve(config.FONT_PATH) }
}

/** Print the outcome of a run and return the process exit code for it. */
export function reportRun(report: RunReport): number {
  if (report.state === 'finalized') {
    const { artifact, frameCount, skipped } = report
    console.log(`✅ ${artifact.path}`)
    console.log(`   ${frameCount} frames, ${artifact.duration.toFixed(2)}s at ${artifact.fps} fps, ${artifact.bytes} bytes`)
    if (skipped.length > 0) {
      console.log(`   Skipped ${skipped.length} unit(s): ${skipped.map((s) => s.index).join(', ')}`)
    }
    return 0
  }

  const { error, skipped } = report
  const where = error.unitIndex !== undefined ? ` (unit ${error.unitIndex})` : ''
  console.error(`❌ ${error.kind}${where}: ${error.message}`)
  if (skipped.length > 0) {
    console.error(`   ${skipped.length} unit(s) were skipped before the failure: ${skipped.map((s) => s.index).join(', ')}`)
  }
  return error.kind === 'Cancelled' ? EXIT_CANCELLED : 1
}

/**
 * Compile a manifest into a video. Throws `ConfigError` for invalid settings
 * or manifests; every other failure is reported and turned into an exit code.
 */
export async function runRender(manifestPath: string, options: RenderOptions, signal?: AbortSignal): Promise<number> {
  const config = initConfig(options)
  if (config.verbose) setVerbose()

  const outputPath = resolve(options.output ?? defaultOutputPath(manifestPath))
  const manifestDir = dirname(resolve(manifestPath))

  pushPipe(dirname(outputPath))
  try {
    logger.info(`Rendering ${resolve(manifestPath)} → ${outputPath}`)
    logger.info(`Canvas ${config.width}x${config.height} at ${config.fps} fps, cache ${config.CACHE_DIR}`)

    const cache = new AssetCache({
      root: config.CACHE_DIR,
      fetcher: new HttpAssetFetcher({
        timeoutMs: config.fetchTimeoutMs,
        retries: config.fetchRetries,
        baseDir: manifestDir,
      }),
      refresh: config.refresh,
    })

    const report = await runPipeline(
      {
        source: new ManifestContentSource(manifestPath, { defaultDuration: config.defaultDuration }),
        cache,
        compositor: new FrameCompositor(config.layout),
        encoder: new SequenceEncoder({ fps: config.fps, crf: config.crf, preset: config.preset }),
      },
      {
        outputPath,
        font: fontReference(config),
        concurrency: config.concurrency,
        strict: config.strict,
        coverSeconds: config.coverSeconds,
        endingSeconds: config.endingSeconds,
        signal,
      },
    )

    const stats = cache.stats()
    logger.info(`Asset cache: ${stats.hits} hits, ${stats.misses} misses, ${stats.bytesFetched} bytes fetched`)
    return reportRun(report)
  } finally {
    popPipe()
  }
}
