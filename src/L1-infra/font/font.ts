import type { Font } from 'opentype.js'
import { createModuleRequire } from '../process/process.js'

// opentype.js ships a UMD bundle whose named exports ESM cannot see.
const require = createModuleRequire(import.meta.url)
const opentype = require('opentype.js') as typeof import('opentype.js')

export { opentype }
export type { Font, Glyph, Path } from 'opentype.js'

/** Parse TTF/OTF/WOFF bytes. Throws if the data is not a font opentype.js can read. */
export function parseFont(bytes: Buffer): Font {
  const arrayBuffer = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(arrayBuffer).set(bytes)
  return opentype.parse(arrayBuffer)
}
