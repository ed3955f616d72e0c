import { sharp } from '../../L1-infra/image/image.js'
import { parseFont } from '../../L1-infra/font/font.js'
import type { AssetKind } from '../../L0-pure/types/index.js'
import { DecodeFailedError, errorMessage } from '../../L0-pure/errors/pipelineErrors.js'

/** Checks that fetched bytes decode as the expected kind. Throws `DecodeFailedError`. */
export type AssetValidator = (bytes: Buffer, kind: AssetKind, source: string) => Promise<void>

export const validateAsset: AssetValidator = async (bytes, kind, source) => {
  if (bytes.length === 0) {
    throw new DecodeFailedError(`${source}: empty ${kind}`)
  }

  switch (kind) {
    case 'image': {
      let width: number | undefined
      let height: number | undefined
      try {
        ({ width, height } = await sharp(bytes).metadata())
      } catch (err: unknown) {
        throw new DecodeFailedError(`${source}: not a decodable image (${errorMessage(err)})`, { cause: err })
      }
      if (!width || !height) {
        throw new DecodeFailedError(`${source}: image has no dimensions`)
      }
      return
    }
    case 'font': {
      try {
        const font = parseFont(bytes)
        if (!font.unitsPerEm) throw new Error('missing unitsPerEm')
      } catch (err: unknown) {
        throw new DecodeFailedError(`${source}: not a readable font (${errorMessage(err)})`, { cause: err })
      }
      return
    }
  }
}
