import { sharp } from '../../L1-infra/image/image.js'
import type { OverlayOptions } from '../../L1-infra/image/image.js'
import { parseFont } from '../../L1-infra/font/font.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type {
  CachedAsset,
  ContentUnit,
  Frame,
  LayoutConfig,
  ResolvedAssets,
  TextImageUnit,
  TextSlot,
  TextUnit,
} from '../../L0-pure/types/index.js'
import { inset, letterbox } from '../../L0-pure/layout/geometry.js'
import type { Region } from '../../L0-pure/layout/geometry.js'
import { layoutText } from '../../L0-pure/layout/textLayout.js'
import { toHex, toRgba } from '../../L0-pure/color/color.js'
import {
  CompositionFailedError,
  DecodeFailedError,
  errorMessage,
  isPipelineError,
} from '../../L0-pure/errors/pipelineErrors.js'
import { GlyphRenderer } from './glyphRenderer.js'

/** Corner radius of the optional panel behind text. */
const PANEL_RADIUS = 10

/** Text placed in one region with its own color and size. */
interface TextBlock extends TextSlot {
  text: string
}

/**
 * Lays out one content unit onto fixed-size RGBA canvases.
 *
 * Output depends only on the unit, the asset bytes handed in, and the layout
 * config. Layers stack as background, image, layout panels, then text. Text
 * that overflows its region continues on further frames, and the unit's
 * duration is divided evenly between them.
 */
export class FrameCompositor {
  private readonly renderers = new Map<string, GlyphRenderer>()
  private readonly panels: OverlayOptions[]

  constructor(readonly layout: LayoutConfig) {
    this.panels = panelOverlay(layout)
  }

  async compose(unit: ContentUnit, assets: ResolvedAssets): Promise<Frame[]> {
    switch (unit.kind) {
      case 'image': {
        const image = await this.imageLayer(requireAsset(assets.image, 'image'), this.layout.regions.image)
        return this.render([[image, ...this.panels]], unit.duration)
      }
      case 'text': {
        const blocks = this.textBlocks(unit, this.layout.regions.text)
        const pages = this.textLayers(blocks, requireAsset(assets.font, 'font'))
        return this.render(pages.map((page) => [...this.panels, ...page]), unit.duration)
      }
      case 'text+image': {
        const { image: imageRegion, text: textRegion } = this.layout.regions.textImage
        const image = await this.imageLayer(requireAsset(assets.image, 'image'), imageRegion)
        const pages = this.textLayers(this.textBlocks(unit, textRegion), requireAsset(assets.font, 'font'))
        return this.render(pages.map((page) => [image, ...this.panels, ...page]), unit.duration)
      }
    }
  }

  /** Glyph renderer for a font asset at a pixel size; parsed once per digest and size. */
  renderer(font: CachedAsset, fontSize: number = this.layout.fontSize): GlyphRenderer {
    const key = `${font.digest}@${fontSize}`
    let renderer = this.renderers.get(key)
    if (!renderer) {
      try {
        renderer = new GlyphRenderer(parseFont(font.bytes), fontSize, this.layout.replacementChar)
      } catch (err: unknown) {
        throw new DecodeFailedError(`${font.source}: not a readable font (${errorMessage(err)})`, { cause: err })
      }
      this.renderers.set(key, renderer)
    }
    return renderer
  }

  // ── Layers ─────────────────────────────────────────────────────────────────

  private async imageLayer(asset: CachedAsset, region: Region): Promise<OverlayOptions> {
    let width: number | undefined
    let height: number | undefined
    let orientation: number | undefined
    try {
      ({ width, height, orientation } = await sharp(asset.bytes).metadata())
    } catch (err: unknown) {
      throw new DecodeFailedError(`${asset.source}: not a decodable image (${errorMessage(err)})`, { cause: err })
    }
    if (!width || !height) {
      throw new DecodeFailedError(`${asset.source}: image has no dimensions`)
    }

    // EXIF orientations 5-8 rotate by 90°, swapping the displayed axes.
    const upright = (orientation ?? 1) >= 5 ? { width: height, height: width } : { width, height }
    const placement = letterbox(upright, region)

    try {
      const input = await sharp(asset.bytes)
        .rotate()
        .resize(placement.width, placement.height, { fit: 'fill' })
        .png()
        .toBuffer()
      return { input, left: placement.left, top: placement.top }
    } catch (err: unknown) {
      throw new CompositionFailedError(`Cannot scale ${asset.source}: ${errorMessage(err)}`, { cause: err })
    }
  }

  /**
   * The text blocks of a unit: its whole text in `region`, or one field per
   * text slot when the layout has slots and the unit kept its fields.
   */
  private textBlocks(unit: TextUnit | TextImageUnit, region: Region): TextBlock[] {
    const { textSlots = [], textColor, fontSize, lineHeight } = this.layout
    const fields = unit.fields
    if (textSlots.length === 0 || !fields) {
      return [{ text: unit.text, region, color: textColor, fontSize, lineHeight }]
    }
    const last = textSlots.length - 1
    return textSlots.map((slot, i) => ({
      ...slot,
      text: i < last
        ? fields[i] ?? ''
        : fields.slice(last).filter((field) => field.trim() !== '').join('\n'),
    }))
  }

  /**
   * One SVG overlay per page. Every block is wrapped and paginated on its own;
   * the unit runs to the longest block and shorter blocks are blank after
   * their last page.
   */
  private textLayers(blocks: TextBlock[], font: CachedAsset): OverlayOptions[][] {
    const { padding, panelColor, width, height } = this.layout

    const laidOut = blocks.map((block) => {
      const glyphs = this.renderer(font, block.fontSize)
      const inner = inset(block.region, padding)
      const linesPerPage = Math.floor(inner.height / block.lineHeight)
      if (linesPerPage < 1) {
        logger.warn(`Text region ${inner.width}x${inner.height} is shorter than one line; text may be clipped`)
      }
      const pages = layoutText(block.text, (s) => glyphs.measure(s), { maxWidth: inner.width, linesPerPage })
      // Center the glyph box (ascent + descent) vertically within each line.
      const baselineOffset = (block.lineHeight - (glyphs.ascent + glyphs.descent)) / 2 + glyphs.ascent
      return { block, glyphs, inner, pages, baselineOffset }
    })

    const panel = panelColor
      ? blocks
        .map(({ region }) => `<rect x="${region.left}" y="${region.top}" width="${region.width}" height="${region.height}" rx="${PANEL_RADIUS}" ry="${PANEL_RADIUS}" fill="${toHex(panelColor)}"/>`)
        .join('')
      : ''
    const pageCount = Math.max(...laidOut.map(({ pages }) => pages.length))

    return Array.from({ length: pageCount }, (_, p) => {
      const paths = laidOut
        .map(({ block, glyphs, inner, pages, baselineOffset }) => {
          const d = (pages[p] ?? [])
            .map((line, i) => glyphs.pathData(line, inner.left, inner.top + i * block.lineHeight + baselineOffset))
            .filter(Boolean)
            .join(' ')
          return d ? `<path d="${d}" fill="${toHex(block.color)}"/>` : ''
        })
        .join('')
      if (!paths && !panel) return []
      const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">${panel}${paths}</svg>`
      return [{ input: Buffer.from(svg), left: 0, top: 0 }]
    })
  }

  // ── Raster ─────────────────────────────────────────────────────────────────

  private async render(pages: OverlayOptions[][], duration: number): Promise<Frame[]> {
    const pageDuration = duration / pages.length
    const frames: Frame[] = []
    for (const layers of pages) {
      frames.push({ ...(await this.rasterize(layers)), duration: pageDuration })
    }
    return frames
  }

  private async rasterize(layers: OverlayOptions[]): Promise<Omit<Frame, 'duration'>> {
    const { width, height, background } = this.layout
    try {
      const canvas = sharp({ create: { width, height, channels: 4, background: toRgba(background) } })
      const { data, info } = await (layers.length > 0 ? canvas.composite(layers) : canvas)
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true })

      if (info.width !== width || info.height !== height || data.length !== width * height * 4) {
        throw new Error(`raster is ${info.width}x${info.height}x${info.channels}, expected ${width}x${height}x4`)
      }
      return { width, height, pixels: data }
    } catch (err: unknown) {
      if (isPipelineError(err)) throw err
      throw new CompositionFailedError(`Cannot render frame: ${errorMessage(err)}`, { cause: err })
    }
  }
}

/** Solid layout panels as a single full-canvas overlay, or nothing. */
function panelOverlay({ panels = [], width, height }: LayoutConfig): OverlayOptions[] {
  if (panels.length === 0) return []
  const rects = panels
    .map(({ region, color }) => `<rect x="${region.left}" y="${region.top}" width="${region.width}" height="${region.height}" fill="${toHex(color)}"/>`)
    .join('')
  const svg = `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">${rects}</svg>`
  return [{ input: Buffer.from(svg), left: 0, top: 0 }]
}

function requireAsset(asset: CachedAsset | undefined, kind: 'image' | 'font'): CachedAsset {
  if (!asset) {
    throw new CompositionFailedError(`No ${kind} asset was resolved for this unit`)
  }
  return asset
}
