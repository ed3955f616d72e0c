#!/usr/bin/env node
import { Command, InvalidArgumentError } from '../L1-infra/cli/cli.js'
import { initConfig } from '../L1-infra/config/environment.js'
import logger from '../L1-infra/logger/configLogger.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { ConfigError, errorMessage } from '../L0-pure/errors/pipelineErrors.js'
import { runRender } from './commands/render.js'
import type { RenderOptions } from './commands/render.js'
import { runExample } from './commands/example.js'
import { runDoctor } from './commands/doctor.js'
import { runCacheVerify } from './commands/cache.js'

/** Exit code for invalid configuration or manifests. */
const EXIT_CONFIG = 2

const pkg: { version: string } = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))

// ── Option parsers ───────────────────────────────────────────────────────────

function positiveNumber(value: string): number {
  const parsed = Number(value)
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.')
  }
  return parsed
}

function positiveInteger(value: string): number {
  const parsed = positiveNumber(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Must be a whole number.')
  }
  return parsed
}

/** Run a command body and exit with its code; ConfigError exits with EXIT_CONFIG. */
async function exitWith(action: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await action()
  } catch (err: unknown) {
    if (err instanceof ConfigError) {
      console.error(`❌ Configuration error: ${err.message}`)
      process.exitCode = EXIT_CONFIG
      return
    }
    logger.error(`Unexpected error: ${errorMessage(err)}`)
    process.exitCode = 1
  }
}

// ── Program ──────────────────────────────────────────────────────────────────

const program = new Command()

program
  .name('framecast')
  .description('Compile scraped text and images into a video')
  .version(pkg.version, '-V, --version')

program
  .command('example')
  .description('Write an example manifest, config and sample images')
  .argument('[dir]', 'Target directory', 'framecast-example')
  .action(async (dir: string) => {
    await exitWith(async () => {
      await runExample(dir)
      return 0
    })
  })

program
  .command('doctor')
  .description('Check Node.js, FFmpeg, the configured font and the cache directory')
  .option('--config <path>', 'Config file (default: ./framecast.json)')
  .option('--font <path>', 'Font file or URL to check')
  .option('--cache-dir <path>', 'Cache directory to check')
  .action(async (opts: { config?: string; font?: string; cacheDir?: string }) => {
    await exitWith(async () => {
      initConfig(opts)
      return runDoctor()
    })
  })

const cache = program.command('cache').description('Inspect the asset cache')

cache
  .command('verify')
  .description('Re-hash every cached object and report corrupt entries')
  .option('--cache-dir <path>', 'Cache directory (default: ./.framecast-cache)')
  .option('--config <path>', 'Config file (default: ./framecast.json)')
  .option('--remove', 'Delete corrupt objects')
  .action(async (opts: { cacheDir?: string; config?: string; remove?: boolean }) => {
    await exitWith(async () => {
      initConfig({ cacheDir: opts.cacheDir, config: opts.config })
      return runCacheVerify({ remove: opts.remove })
    })
  })

// --- Default command ---
// Declared after the subcommands so they take priority

program
  .command('render', { isDefault: true })
  .description('Compile a content manifest into an MP4 video')
  .argument('<manifest>', 'JSON manifest of content units')
  .option('-o, --output <path>', 'Output video path (default: <manifest>.mp4)')
  .option('--strict', 'Fail the run on the first unit error instead of skipping the unit')
  .option('--fps <n>', 'Frames per second (default: 30)', positiveNumber)
  .option('--width <px>', 'Canvas width, even (default: 1280)', positiveInteger)
  .option('--height <px>', 'Canvas height, even (default: 720)', positiveInteger)
  .option('--font <path>', 'Font file or URL used for text')
  .option('--cache-dir <path>', 'Asset cache directory (default: ./.framecast-cache)')
  .option('--concurrency <n>', 'Units resolving assets at once (default: 4)', positiveInteger)
  .option('--timeout <ms>', 'Per-request fetch timeout in ms (default: 15000)', positiveInteger)
  .option('--duration <s>', 'Seconds per unit when the manifest sets none (default: 3)', positiveNumber)
  .option('--background <color>', 'Canvas color, #rrggbb or a color name (default: white)')
  .option('--config <path>', 'Config file (default: ./framecast.json)')
  .option('--refresh', 'Fetch every asset again, ignoring the cache index')
  .option('-v, --verbose', 'Verbose logging')
  .action(async (manifest: string, opts: RenderOptions) => {
    const controller = new AbortController()
    const onSigint = (): void => {
      if (controller.signal.aborted) process.exit(130)
      logger.warn('Interrupted: cancelling the run (press Ctrl+C again to force quit)')
      controller.abort()
    }
    process.on('SIGINT', onSigint)
    try {
      await exitWith(() => runRender(manifest, opts, controller.signal))
    } finally {
      process.off('SIGINT', onSigint)
    }
  })

await program.parseAsync()
