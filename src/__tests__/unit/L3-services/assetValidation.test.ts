import { describe, it, expect } from 'vitest'
import { sharp } from '../../../L1-infra/image/image.js'
import { validateAsset } from '../../../L3-services/assetCache/assetValidation.js'
import { DecodeFailedError } from '../../../L0-pure/errors/pipelineErrors.js'
import { buildTestFont } from '../../helpers/testFont.js'

async function tinyPng(): Promise<Buffer> {
  return sharp({ create: { width: 4, height: 2, channels: 3, background: { r: 0, g: 128, b: 255 } } }).png().toBuffer()
}

describe('validateAsset', () => {
  it('accepts a decodable image', async () => {
    await expect(validateAsset(await tinyPng(), 'image', 'tiny.png')).resolves.toBeUndefined()
  })

  it('accepts a readable font', async () => {
    await expect(validateAsset(buildTestFont(), 'font', 'test.ttf')).resolves.toBeUndefined()
  })

  it('rejects empty bytes', async () => {
    const result = validateAsset(Buffer.alloc(0), 'image', 'empty.png')
    await expect(result).rejects.toBeInstanceOf(DecodeFailedError)
    await expect(result).rejects.toThrow('empty.png: empty image')
  })

  it('rejects bytes that are not an image', async () => {
    await expect(validateAsset(Buffer.from('<html>not found</html>'), 'image', 'page.png'))
      .rejects.toThrow('page.png: not a decodable image')
  })

  it('rejects bytes that are not a font', async () => {
    await expect(validateAsset(await tinyPng(), 'font', 'fake.ttf'))
      .rejects.toThrow('fake.ttf: not a readable font')
  })
})
