/**
 * L4-L5 Integration Test: render command end to end
 *
 * Mock boundary: fluent-ffmpeg (in-process fake that records the raw stream)
 * Real code:     config, manifest, asset cache, fetcher (file refs), sharp compositor,
 *                sequence encoder, pipeline, render command
 */
import { vi, describe, test, expect, beforeEach, afterEach } from 'vitest'
import type { MockInstance } from 'vitest'
import { promises as fsp } from 'fs'
import os from 'os'
import { join } from 'path'

vi.mock('../../../L1-infra/ffmpeg/ffmpeg.js', async () => {
  const { fakeFfmpeg } = await import('../../helpers/fakeFfmpeg.js')
  return { fluentFfmpeg: fakeFfmpeg }
})

import { runRender } from '../../../L5-app/commands/render.js'
import type { RenderOptions } from '../../../L5-app/commands/render.js'
import { sharp } from '../../../L1-infra/image/image.js'
import { ConfigError } from '../../../L0-pure/errors/pipelineErrors.js'
import { fakeRuns, resetFakeFfmpeg, runInput } from '../../helpers/fakeFfmpeg.js'
import { buildTestFont } from '../../helpers/testFont.js'

const WIDTH = 320
const HEIGHT = 180
const FRAME_BYTES = WIDTH * HEIGHT * 4
const REMOTE_IMAGE = 'https://assets.example.com/green.png'

const ENV_VARS = [
  'FRAMECAST_CONFIG',
  'FRAMECAST_WIDTH',
  'FRAMECAST_HEIGHT',
  'FRAMECAST_FPS',
  'FRAMECAST_CONCURRENCY',
  'FRAMECAST_FETCH_TIMEOUT_MS',
  'FRAMECAST_FETCH_RETRIES',
  'FRAMECAST_STRICT',
  'FRAMECAST_BACKGROUND',
  'FRAMECAST_CACHE_DIR',
  'FRAMECAST_FONT',
  'FFMPEG_PATH',
]

describe('L4-L5 Integration: framecast render', () => {
  let dir: string
  let log: MockInstance<typeof console.log>
  let manifestPath: string
  let options: RenderOptions

  async function writeManifest(units: unknown[]): Promise<void> {
    await fsp.writeFile(manifestPath, JSON.stringify({ defaultDuration: 1, units }))
  }

  beforeEach(async () => {
    resetFakeFfmpeg()
    for (const name of ENV_VARS) vi.stubEnv(name, '')
    log = vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    dir = await fsp.mkdtemp(join(os.tmpdir(), 'framecast-render-test-'))
    await fsp.mkdir(join(dir, 'images'))
    await fsp.writeFile(join(dir, 'Test.ttf'), buildTestFont())
    await sharp({ create: { width: 640, height: 480, channels: 3, background: { r: 0, g: 128, b: 0 } } })
      .png()
      .toFile(join(dir, 'images', 'green.png'))
    await fsp.writeFile(join(dir, 'images', 'broken.png'), '<html>404</html>')

    manifestPath = join(dir, 'manifest.json')
    options = {
      width: WIDTH,
      height: HEIGHT,
      fps: 2,
      font: join(dir, 'Test.ttf'),
      cacheDir: join(dir, 'cache'),
      output: join(dir, 'out', 'video.mp4'),
    }
  })

  afterEach(async () => {
    vi.unstubAllEnvs()
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
    await fsp.rm(dir, { recursive: true, force: true })
  })

  test('renders every unit into one video', async () => {
    await writeManifest([
      { text: 'Hello' },
      { image: 'images/green.png', duration: 1.5 },
      { image: 'images/green.png', text: 'Green' },
    ])

    const code = await runRender(manifestPath, options)

    expect(code).toBe(0)
    // 1s + 1.5s + 1s at 2 fps
    const input = runInput(fakeRuns[0])
    expect(input.length).toBe(7 * FRAME_BYTES)
    const output = await fsp.readFile(join(dir, 'out', 'video.mp4'))
    expect(output.equals(input)).toBe(true)
    expect(log.mock.calls.map((c) => c[0])).toEqual([
      `✅ ${join(dir, 'out', 'video.mp4')}`,
      `   3 frames, 3.50s at 2 fps, ${7 * FRAME_BYTES} bytes`,
    ])
  })

  test('renders byte-identical videos from the cache without downloading again', async () => {
    const greenPng = await fsp.readFile(join(dir, 'images', 'green.png'))
    const mockFetch = vi.fn<typeof fetch>(async () => new Response(new Uint8Array(greenPng), { status: 200 }))
    vi.stubGlobal('fetch', mockFetch)
    await writeManifest([
      { image: REMOTE_IMAGE },
      { image: 'images/green.png', text: 'Green' },
    ])

    const first = await runRender(manifestPath, { ...options, output: join(dir, 'out', 'first.mp4') })
    const second = await runRender(manifestPath, { ...options, output: join(dir, 'out', 'second.mp4') })

    expect([first, second]).toEqual([0, 0])
    expect(mockFetch).toHaveBeenCalledTimes(1)
    expect(mockFetch.mock.calls[0][0]).toBe(REMOTE_IMAGE)
    const firstBytes = await fsp.readFile(join(dir, 'out', 'first.mp4'))
    const secondBytes = await fsp.readFile(join(dir, 'out', 'second.mp4'))
    expect(firstBytes.length).toBe(4 * FRAME_BYTES)
    expect(secondBytes.equals(firstBytes)).toBe(true)
    // Only the downloaded image is indexed; local files are read on every run
    expect(await fsp.readdir(join(dir, 'cache', 'refs'))).toHaveLength(1)
  })

  test('skips an undecodable image and still renders the rest', async () => {
    await writeManifest([
      { text: 'Before' },
      { image: 'images/broken.png' },
      { text: 'After' },
    ])

    const code = await runRender(manifestPath, options)

    expect(code).toBe(0)
    expect(runInput(fakeRuns[0]).length).toBe(4 * FRAME_BYTES)
    expect(log.mock.calls.map((c) => c[0])).toContain('   Skipped 1 unit(s): 1')
  })

  test('fails in strict mode without writing a video', async () => {
    await writeManifest([
      { text: 'Before' },
      { image: 'images/broken.png' },
    ])

    const code = await runRender(manifestPath, { ...options, strict: true })

    expect(code).toBe(1)
    expect(fakeRuns).toHaveLength(0)
    await expect(fsp.access(join(dir, 'out', 'video.mp4'))).rejects.toThrow()
  })

  test('reports a missing local image as a skipped unit', async () => {
    await writeManifest([{ image: 'images/missing.png' }, { text: 'Only text' }])

    const code = await runRender(manifestPath, options)

    expect(code).toBe(0)
    expect(runInput(fakeRuns[0]).length).toBe(2 * FRAME_BYTES)
  })

  test('rejects an invalid manifest before rendering', async () => {
    await fsp.writeFile(manifestPath, JSON.stringify({ units: [{ duration: 1 }] }))

    await expect(runRender(manifestPath, options)).rejects.toBeInstanceOf(ConfigError)
    expect(fakeRuns).toHaveLength(0)
  })

  test('returns 130 when cancelled', async () => {
    await writeManifest([{ text: 'Hello' }])
    const controller = new AbortController()
    controller.abort()

    const code = await runRender(manifestPath, options, controller.signal)

    expect(code).toBe(130)
    expect(fakeRuns).toHaveLength(0)
  })
})
