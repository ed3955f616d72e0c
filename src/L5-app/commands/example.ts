import { sharp } from '../../L1-infra/image/image.js'
import { ensureDirectory, fileExistsSync, writeFileBuffer, writeJsonFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { join, resolve } from '../../L1-infra/paths/paths.js'
import { parseColor, toHex, toRgba } from '../../L0-pure/color/color.js'

/** Fonts commonly present on Linux, macOS and Windows installs. */
const SYSTEM_FONT_CANDIDATES = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
  '/usr/share/fonts/dejavu/DejaVuSans.ttf',
  '/usr/share/fonts/TTF/DejaVuSans.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf',
  '/Library/Fonts/Arial Unicode.ttf',
  '/System/Library/Fonts/Supplemental/Arial.ttf',
  'C:\\Windows\\Fonts\\arial.ttf',
]

const SAMPLES = [
  { file: 'sample-1.png', background: 'orchid', accent: 'white', width: 960, height: 640 },
  { file: 'sample-2.png', background: 'cyan', accent: 'blue', width: 640, height: 960 },
  { file: 'sample-3.png', background: 'gold', accent: 'brown', width: 800, height: 800 },
] as const

export interface ExampleResult {
  dir: string
  manifestPath: string
  configPath: string
  images: string[]
  font?: string
}

export function findSystemFont(candidates: readonly string[] = SYSTEM_FONT_CANDIDATES): string | undefined {
  return candidates.find((path) => fileExistsSync(path))
}

/** A flat-colored sample picture with a centered disc, so orientation and scaling are visible. */
async function samplePng(width: number, height: number, background: string, accent: string): Promise<Buffer> {
  const radius = Math.round(Math.min(width, height) / 4)
  const disc = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`
    + `<circle cx="${width / 2}" cy="${height / 2}" r="${radius}" fill="${toHex(parseColor(accent))}"/></svg>`
  return sharp({ create: { width, height, channels: 4, background: toRgba(parseColor(background)) } })
    .composite([{ input: Buffer.from(disc), left: 0, top: 0 }])
    .png()
    .toBuffer()
}

/** Write a runnable example project: manifest, config and three sample images. */
export async function runExample(targetDir = 'framecast-example', font = findSystemFont()): Promise<ExampleResult> {
  const dir = resolve(targetDir)
  await ensureDirectory(join(dir, 'images'))

  const images: string[] = []
  for (const sample of SAMPLES) {
    const path = join(dir, 'images', sample.file)
    await writeFileBuffer(path, await samplePng(sample.width, sample.height, sample.background, sample.accent))
    images.push(path)
  }

  const manifestPath = join(dir, 'manifest.json')
  await writeJsonFile(manifestPath, {
    title: 'framecast example',
    defaultDuration: 3,
    units: [
      { text: 'framecast turns scraped pages into video.\nEach unit becomes one or more frames.' },
      { image: 'images/sample-1.png', duration: 2 },
      { image: 'images/sample-2.png', text: 'A portrait image is letterboxed into its region.' },
      { image: 'images/sample-3.png', text: 'Long captions wrap at word boundaries and continue on further frames when they overflow.', duration: 4 },
    ],
  })

  const configPath = join(dir, 'framecast.json')
  await writeJsonFile(configPath, {
    width: 1280,
    height: 720,
    fps: 30,
    ...(font ? { font } : {}),
    coverSeconds: 1,
    endingSeconds: 1,
    layout: {
      background: 'snow',
      textColor: 'black',
      fontSize: 40,
    },
  })

  console.log(`Example written to ${dir}`)
  if (!font) {
    console.log('No system font found: add "font": "<path to a .ttf>" to framecast.json before rendering.')
  }
  console.log(`Render it with: framecast render ${manifestPath} --config ${configPath} -o ${join(dir, 'example.mp4')}`)

  return { dir, manifestPath, configPath, images, font }
}
