import type { Font, Glyph } from '../../L1-infra/font/font.js'

/** Last-resort stand-in when neither the replacement character nor `?` has a glyph. */
const FALLBACK_CHAR = '?'

/**
 * Glyph metrics and outlines of one font at one pixel size.
 *
 * Characters the font cannot draw resolve to the replacement character, then
 * `?`, then the font's `.notdef` glyph, so every string has a width and a shape.
 */
export class GlyphRenderer {
  readonly scale: number
  private readonly glyphs = new Map<string, Glyph>()

  constructor(
    private readonly font: Font,
    readonly fontSize: number,
    private readonly replacementChar: string,
  ) {
    this.scale = fontSize / font.unitsPerEm
  }

  /** Distance from baseline to the top of the tallest glyphs, in pixels. */
  get ascent(): number {
    return this.font.ascender * this.scale
  }

  /** Distance from baseline to the bottom of descenders, in pixels (positive). */
  get descent(): number {
    return Math.abs(this.font.descender) * this.scale
  }

  hasGlyph(ch: string): boolean {
    return this.font.charToGlyphIndex(ch) > 0
  }

  glyphFor(ch: string): Glyph {
    let glyph = this.glyphs.get(ch)
    if (!glyph) {
      glyph = this.lookup(ch)
      this.glyphs.set(ch, glyph)
    }
    return glyph
  }

  /** Advance width of a string in pixels. No kerning. */
  measure(text: string): number {
    let width = 0
    for (const ch of text) {
      width += (this.glyphFor(ch).advanceWidth ?? 0) * this.scale
    }
    return width
  }

  /** SVG path data for `text` with its baseline starting at (x, y). */
  pathData(text: string, x: number, y: number): string {
    const parts: string[] = []
    let cursor = x
    for (const ch of text) {
      const glyph = this.glyphFor(ch)
      const d = glyph.getPath(cursor, y, this.fontSize).toPathData(2)
      if (d) parts.push(d)
      cursor += (glyph.advanceWidth ?? 0) * this.scale
    }
    return parts.join(' ')
  }

  private lookup(ch: string): Glyph {
    for (const candidate of [ch, this.replacementChar, FALLBACK_CHAR]) {
      if (this.hasGlyph(candidate)) return this.font.charToGlyph(candidate)
    }
    return this.font.glyphs.get(0)
  }
}
