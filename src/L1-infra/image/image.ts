import sharp from 'sharp'

export { sharp }
export type { Sharp, OverlayOptions, Metadata } from 'sharp'
