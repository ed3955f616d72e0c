import { z } from 'zod'
import { join, resolve, dirname } from '../paths/paths.js'
import { fileExistsSync, readTextFileSync } from '../fileSystem/fileSystem.js'
import { loadEnvFile } from '../env/env.js'
import { parseColor } from '../../L0-pure/color/color.js'
import { fitsCanvas } from '../../L0-pure/layout/geometry.js'
import type { Region } from '../../L0-pure/layout/geometry.js'
import type { LayoutConfig, LayoutRegions } from '../../L0-pure/types/index.js'
import { ConfigError, errorMessage } from '../../L0-pure/errors/pipelineErrors.js'

// Load .env file from the working directory
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  loadEnvFile(envPath)
}

export interface AppConfig {
  width: number
  height: number
  fps: number
  /** H.264 constant rate factor */
  crf: number
  /** x264 preset */
  preset: string
  FFMPEG_PATH: string
  CACHE_DIR: string
  FONT_PATH: string
  concurrency: number
  fetchTimeoutMs: number
  fetchRetries: number
  /** Seconds a unit stays on screen when its manifest entry gives no duration */
  defaultDuration: number
  coverSeconds: number
  endingSeconds: number
  strict: boolean
  refresh: boolean
  verbose: boolean
  layout: LayoutConfig
}

export interface CLIOptions {
  config?: string
  width?: number
  height?: number
  fps?: number
  font?: string
  cacheDir?: string
  concurrency?: number
  timeout?: number
  duration?: number
  background?: string
  strict?: boolean
  refresh?: boolean
  verbose?: boolean
}

// ── Config file schema ───────────────────────────────────────────────────────

const regionSchema = z.object({
  left: z.number().int().min(0),
  top: z.number().int().min(0),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
})

const colorSchema = z.string().superRefine((value, ctx) => {
  try {
    parseColor(value)
  } catch (err: unknown) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) })
  }
})

const layoutFileSchema = z.object({
  background: colorSchema.optional(),
  textColor: colorSchema.optional(),
  panelColor: colorSchema.optional(),
  fontSize: z.number().positive().optional(),
  lineHeight: z.number().positive().optional(),
  padding: z.number().int().min(0).optional(),
  replacementChar: z.string().min(1).optional(),
  regions: z.object({
    image: regionSchema.optional(),
    text: regionSchema.optional(),
    textImage: z.object({ image: regionSchema, text: regionSchema }).optional(),
  }).optional(),
  /** One positioned block per text column of a table manifest */
  slots: z.array(z.object({
    region: regionSchema,
    color: colorSchema.optional(),
    fontSize: z.number().positive().optional(),
    lineHeight: z.number().positive().optional(),
  })).optional(),
  panels: z.array(z.object({ region: regionSchema, color: colorSchema })).optional(),
})

export const configFileSchema = z.object({
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  fps: z.number().positive().optional(),
  crf: z.number().int().min(0).max(51).optional(),
  preset: z.string().optional(),
  font: z.string().optional(),
  cacheDir: z.string().optional(),
  concurrency: z.number().int().min(1).optional(),
  fetchTimeoutMs: z.number().int().positive().optional(),
  fetchRetries: z.number().int().min(0).optional(),
  defaultDuration: z.number().positive().optional(),
  coverSeconds: z.number().min(0).optional(),
  endingSeconds: z.number().min(0).optional(),
  strict: z.boolean().optional(),
  layout: layoutFileSchema.optional(),
})

export type ConfigFile = z.infer<typeof configFileSchema>

const DEFAULT_CONFIG_FILE = 'framecast.json'

/** Read and validate a JSON config file. Paths inside it resolve against its folder. */
export function loadConfigFile(filePath: string): ConfigFile {
  let raw: unknown
  try {
    raw = JSON.parse(readTextFileSync(filePath))
  } catch (err: unknown) {
    throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(err)}`)
  }
  const parsed = configFileSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid config ${filePath}: ${issues.join('; ')}`)
  }
  const baseDir = dirname(resolve(filePath))
  const file = parsed.data
  return {
    ...file,
    font: file.font ? resolve(baseDir, file.font) : undefined,
    cacheDir: file.cacheDir ? resolve(baseDir, file.cacheDir) : undefined,
  }
}

// ── Defaults ─────────────────────────────────────────────────────────────────

/** Default regions: full canvas for images, inset for text, a 60/40 split for both. */
export function defaultRegions(width: number, height: number): LayoutRegions {
  const margin = Math.round(Math.min(width, height) * 0.08)
  const imageHeight = Math.round(height * 0.6)
  const full: Region = { left: 0, top: 0, width, height }
  return {
    image: full,
    text: { left: margin, top: margin, width: width - margin * 2, height: height - margin * 2 },
    textImage: {
      image: { left: 0, top: 0, width, height: imageHeight },
      text: { left: margin, top: imageHeight, width: width - margin * 2, height: height - imageHeight },
    },
  }
}

function envNumber(name: string): number | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`)
  }
  return value
}

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return undefined
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase())
}

function validate(config: AppConfig): AppConfig {
  const problems: string[] = []
  const { width, height, layout } = config

  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 2 || height < 2) {
    problems.push(`canvas must be at least 2x2 whole pixels, got ${width}x${height}`)
  } else if (width % 2 !== 0 || height % 2 !== 0) {
    // yuv420p subsamples chroma 2x2
    problems.push(`canvas width and height must be even, got ${width}x${height}`)
  }
  if (!(config.fps > 0)) problems.push(`fps must be positive, got ${config.fps}`)
  if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
    problems.push(`concurrency must be a positive integer, got ${config.concurrency}`)
  }
  if (!(config.fetchTimeoutMs > 0)) problems.push(`fetch timeout must be positive, got ${config.fetchTimeoutMs}`)
  if (!(config.defaultDuration > 0)) problems.push(`default duration must be positive, got ${config.defaultDuration}`)

  const regions: Array<[string, Region]> = [
    ['regions.image', layout.regions.image],
    ['regions.text', layout.regions.text],
    ['regions.textImage.image', layout.regions.textImage.image],
    ['regions.textImage.text', layout.regions.textImage.text],
  ]
  layout.textSlots?.forEach((slot, i) => regions.push([`slots.${i}.region`, slot.region]))
  layout.panels?.forEach((panel, i) => regions.push([`panels.${i}.region`, panel.region]))
  for (const [name, region] of regions) {
    if (!fitsCanvas(region, width, height)) {
      problems.push(`layout ${name} does not fit the ${width}x${height} canvas`)
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`)
  }
  return config
}

// ── Public API ───────────────────────────────────────────────────────────────

let config: AppConfig | null = null

/**
 * Merge CLI options → FRAMECAST_* env vars → config file → defaults.
 * Call before getConfig(). Throws ConfigError on invalid values.
 */
export function initConfig(cli: CLIOptions = {}): AppConfig {
  const configPath = cli.config || process.env.FRAMECAST_CONFIG || join(process.cwd(), DEFAULT_CONFIG_FILE)
  const file: ConfigFile = cli.config || fileExistsSync(configPath) ? loadConfigFile(configPath) : {}
  const fileLayout = file.layout ?? {}

  const width = cli.width ?? envNumber('FRAMECAST_WIDTH') ?? file.width ?? 1280
  const height = cli.height ?? envNumber('FRAMECAST_HEIGHT') ?? file.height ?? 720
  const fontSize = fileLayout.fontSize ?? 40
  const defaults = defaultRegions(width, height)
  const background = cli.background || process.env.FRAMECAST_BACKGROUND || fileLayout.background || 'white'

  let layout: LayoutConfig
  try {
    const textColor = parseColor(fileLayout.textColor ?? 'black')
    const lineHeight = fileLayout.lineHeight ?? Math.round(fontSize * 1.35)
    layout = {
      width,
      height,
      background: parseColor(background),
      textColor,
      panelColor: fileLayout.panelColor ? parseColor(fileLayout.panelColor) : undefined,
      fontSize,
      lineHeight,
      padding: fileLayout.padding ?? 24,
      replacementChar: fileLayout.replacementChar ?? '\uFFFD',
      regions: {
        image: fileLayout.regions?.image ?? defaults.image,
        text: fileLayout.regions?.text ?? defaults.text,
        textImage: fileLayout.regions?.textImage ?? defaults.textImage,
      },
      // A slot without its own size keeps the layout's line spacing ratio.
      textSlots: fileLayout.slots?.map((slot) => ({
        region: slot.region,
        color: slot.color ? parseColor(slot.color) : textColor,
        fontSize: slot.fontSize ?? fontSize,
        lineHeight: slot.lineHeight ?? (slot.fontSize ? Math.round(slot.fontSize * lineHeight / fontSize) : lineHeight),
      })),
      panels: fileLayout.panels?.map((panel) => ({ region: panel.region, color: parseColor(panel.color) })),
    }
  } catch (err: unknown) {
    throw new ConfigError(errorMessage(err))
  }

  config = validate({
    width,
    height,
    fps: cli.fps ?? envNumber('FRAMECAST_FPS') ?? file.fps ?? 30,
    crf: file.crf ?? 20,
    preset: file.preset ?? 'fast',
    FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg',
    CACHE_DIR: resolve(cli.cacheDir || process.env.FRAMECAST_CACHE_DIR || file.cacheDir || join(process.cwd(), '.framecast-cache')),
    FONT_PATH: cli.font || process.env.FRAMECAST_FONT || file.font || '',
    concurrency: cli.concurrency ?? envNumber('FRAMECAST_CONCURRENCY') ?? file.concurrency ?? 4,
    fetchTimeoutMs: cli.timeout ?? envNumber('FRAMECAST_FETCH_TIMEOUT_MS') ?? file.fetchTimeoutMs ?? 15_000,
    fetchRetries: envNumber('FRAMECAST_FETCH_RETRIES') ?? file.fetchRetries ?? 2,
    defaultDuration: cli.duration ?? file.defaultDuration ?? 3,
    coverSeconds: file.coverSeconds ?? 0,
    endingSeconds: file.endingSeconds ?? 0,
    strict: cli.strict ?? envFlag('FRAMECAST_STRICT') ?? file.strict ?? false,
    refresh: cli.refresh ?? false,
    verbose: cli.verbose ?? false,
    layout,
  })

  return config
}

export function getConfig(): AppConfig {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
