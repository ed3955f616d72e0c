/** An axis-aligned rectangle in canvas pixels. */
export interface Region {
  left: number
  top: number
  width: number
  height: number
}

/** Where a scaled image lands inside its region. */
export interface Placement extends Region {
  scale: number
}

/**
 * Letterbox fit: scale `source` by the largest factor that keeps it inside
 * `region`, keep the aspect ratio, and center it. Dimensions are rounded to
 * whole pixels and never drop below 1.
 */
export function letterbox(source: { width: number; height: number }, region: Region): Placement {
  if (source.width <= 0 || source.height <= 0) {
    throw new Error(`Invalid source size ${source.width}x${source.height}`)
  }
  const scale = Math.min(region.width / source.width, region.height / source.height)
  const width = Math.min(region.width, Math.max(1, Math.round(source.width * scale)))
  const height = Math.min(region.height, Math.max(1, Math.round(source.height * scale)))
  return {
    left: region.left + Math.floor((region.width - width) / 2),
    top: region.top + Math.floor((region.height - height) / 2),
    width,
    height,
    scale,
  }
}

/** Shrink a region by `padding` on every side (never below zero size). */
export function inset(region: Region, padding: number): Region {
  const width = Math.max(0, region.width - padding * 2)
  const height = Math.max(0, region.height - padding * 2)
  return { left: region.left + padding, top: region.top + padding, width, height }
}

/** True when `region` lies entirely inside a `width x height` canvas. */
export function fitsCanvas(region: Region, width: number, height: number): boolean {
  return region.left >= 0
    && region.top >= 0
    && region.width > 0
    && region.height > 0
    && region.left + region.width <= width
    && region.top + region.height <= height
}
