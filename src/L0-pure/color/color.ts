/** An opaque 8-bit RGB color. */
export interface Rgb {
  r: number
  g: number
  b: number
}

export const NAMED_COLORS: Readonly<Record<string, Rgb>> = {
  black: { r: 0, g: 0, b: 0 },
  white: { r: 255, g: 255, b: 255 },
  gray: { r: 128, g: 128, b: 128 },
  gold: { r: 255, g: 215, b: 0 },
  silver: { r: 192, g: 192, b: 192 },
  red: { r: 255, g: 0, b: 0 },
  orange: { r: 255, g: 165, b: 0 },
  yellow: { r: 255, g: 255, b: 0 },
  green: { r: 0, g: 255, b: 0 },
  cyan: { r: 0, g: 255, b: 255 },
  blue: { r: 0, g: 0, b: 255 },
  purple: { r: 128, g: 0, b: 128 },
  violet: { r: 238, g: 130, b: 238 },
  orchid: { r: 218, g: 112, b: 214 },
  pink: { r: 255, g: 192, b: 203 },
  snow: { r: 255, g: 250, b: 250 },
  brown: { r: 165, g: 42, b: 42 },
}

/**
 * Parse `#rrggbb` or a palette name (case-insensitive).
 * Throws on anything else.
 */
export function parseColor(value: string): Rgb {
  const trimmed = value.trim()
  if (trimmed.startsWith('#')) {
    const hex = trimmed.slice(1)
    if (!/^[0-9a-fA-F]{6}$/.test(hex)) {
      throw new Error(`'${value}' starts with # but is not a #rrggbb color`)
    }
    return {
      r: parseInt(hex.slice(0, 2), 16),
      g: parseInt(hex.slice(2, 4), 16),
      b: parseInt(hex.slice(4, 6), 16),
    }
  }
  const name = trimmed.toLowerCase()
  // Own keys only: `constructor` and friends are not colors
  if (!Object.hasOwn(NAMED_COLORS, name)) {
    throw new Error(`'${value}' is neither a #rrggbb color nor a known color name`)
  }
  return NAMED_COLORS[name]
}

/** `#rrggbb` form, used in SVG fills. */
export function toHex({ r, g, b }: Rgb): string {
  return '#' + [r, g, b].map((c) => c.toString(16).padStart(2, '0')).join('')
}

/** sharp's background object form. */
export function toRgba({ r, g, b }: Rgb): { r: number; g: number; b: number; alpha: number } {
  return { r, g, b, alpha: 1 }
}
