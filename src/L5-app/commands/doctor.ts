import { getConfig } from '../../L1-infra/config/environment.js'
import { ensureDirectory, readFileBuffer, removeFile, tempPathBeside, writeFileBuffer } from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'
import { parseFont } from '../../L1-infra/font/font.js'
import { encoderVersion } from '../../L3-services/sequenceEncoder/sequenceEncoder.js'
import { isRemote } from '../../L0-pure/assets/references.js'
import { errorMessage } from '../../L0-pure/errors/pipelineErrors.js'

export interface CheckResult {
  label: string
  ok: boolean
  required: boolean
  message: string
}

function parseVersionFromOutput(output: string): string {
  const match = output.match(/(\d+\.\d+(?:\.\d+)?)/)
  return match ? match[1] : 'unknown'
}

function getFFmpegInstallHint(): string {
  const platform = process.platform
  const lines = ['Install FFmpeg:']
  if (platform === 'win32') {
    lines.push('  winget install Gyan.FFmpeg')
  } else if (platform === 'darwin') {
    lines.push('  brew install ffmpeg')
  } else {
    lines.push('  sudo apt install ffmpeg     (Debian/Ubuntu)')
    lines.push('  sudo dnf install ffmpeg     (Fedora)')
  }
  lines.push('  Or set FFMPEG_PATH to a custom binary location')
  return lines.join('\n          ')
}

export function checkNode(version = process.version): CheckResult {
  const major = parseInt(version.slice(1), 10)
  const ok = major >= 20
  return {
    label: 'Node.js',
    ok,
    required: true,
    message: ok ? `Node.js ${version} (required: ≥20)` : `Node.js ${version}: version ≥20 required`,
  }
}

export function checkFFmpeg(): CheckResult {
  const versionLine = encoderVersion()
  if (versionLine) {
    return { label: 'FFmpeg', ok: true, required: true, message: `FFmpeg ${parseVersionFromOutput(versionLine)}` }
  }
  return { label: 'FFmpeg', ok: false, required: true, message: `FFmpeg not found. ${getFFmpegInstallHint()}` }
}

export async function checkFont(fontPath: string): Promise<CheckResult> {
  if (!fontPath) {
    return {
      label: 'Font',
      ok: false,
      required: false,
      message: 'No font configured (needed for text units: pass --font or set "font" in framecast.json)',
    }
  }
  if (isRemote(fontPath)) {
    return { label: 'Font', ok: true, required: false, message: `Font will be downloaded from ${fontPath}` }
  }
  try {
    const font = parseFont(await readFileBuffer(fontPath))
    const family = font.names.fontFamily?.en ?? 'unknown family'
    return { label: 'Font', ok: true, required: false, message: `Font ${family} (${fontPath})` }
  } catch (err: unknown) {
    return { label: 'Font', ok: false, required: false, message: `Font ${fontPath} is not usable: ${errorMessage(err)}` }
  }
}

export async function checkCacheDir(cacheDir: string): Promise<CheckResult> {
  try {
    await ensureDirectory(cacheDir)
    const checkFile = tempPathBeside(join(cacheDir, 'write-check'))
    await writeFileBuffer(checkFile, 'ok')
    await removeFile(checkFile)
    return { label: 'Cache', ok: true, required: true, message: `Cache directory is writable: ${cacheDir}` }
  } catch (err: unknown) {
    return { label: 'Cache', ok: false, required: true, message: `Cache directory ${cacheDir} is not writable: ${errorMessage(err)}` }
  }
}

/** Print every check and return the exit code: 1 when a required check failed. */
export async function runDoctor(): Promise<number> {
  console.log('\n🔍 framecast doctor: checking prerequisites...\n')

  const config = getConfig()
  const results: CheckResult[] = [
    checkNode(),
    checkFFmpeg(),
    await checkFont(config.FONT_PATH),
    await checkCacheDir(config.CACHE_DIR),
  ]

  for (const r of results) {
    const icon = r.ok ? '✅' : r.required ? '❌' : '⬚'
    console.log(`  ${icon} ${r.message}`)
  }

  const failedRequired = results.filter((r) => r.required && !r.ok)
  console.log()
  if (failedRequired.length === 0) {
    console.log('  All required checks passed! ✅\n')
    return 0
  }
  console.log(`  ${failedRequired.length} required check${failedRequired.length > 1 ? 's' : ''} failed ❌\n`)
  return 1
}
