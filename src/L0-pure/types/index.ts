/**
 * Type definitions for the framecast pipeline.
 *
 * Domain types covering content units, cached assets, composed frames,
 * encoded artifacts, and the orchestrator's run state.
 *
 * ### Time convention
 * All `duration` fields are in **seconds** (floating point). The encoder converts
 * them to whole timebase ticks (`1 / fps` seconds each) when it writes the stream.
 */

import type { PipelineErrorKind } from '../errors/pipelineErrors.js'
import type { Rgb } from '../color/color.js'
import type { Region } from '../layout/geometry.js'

// ============================================================================
// ASSET REFERENCES
// ============================================================================

/** Where an asset's bytes come from. */
export type AssetReference =
  | { type: 'url'; url: string }
  | { type: 'file'; path: string }
  | { type: 'bytes'; bytes: Buffer; label?: string }

/** What the cache validates fetched bytes as. */
export type AssetKind = 'image' | 'font'

/**
 * Bytes of a downloaded or loaded resource, keyed by the SHA-256 of those bytes.
 *
 * @property digest - Lowercase hex SHA-256 of `bytes`
 * @property source - Human-readable description of the reference it came from
 */
export interface CachedAsset {
  digest: string
  bytes: Buffer
  kind: AssetKind
  source: string
}

// ============================================================================
// CONTENT UNITS
// ============================================================================

/**
 * A text-only unit: one block of page text.
 *
 * `fields` keeps the separate text columns of a table row, blanks included,
 * so a layout with text slots can place each column on its own.
 */
export interface TextUnit {
  kind: 'text'
  text: string
  fields?: string[]
  duration: number
}

/** An image-only unit. */
export interface ImageUnit {
  kind: 'image'
  image: AssetReference
  duration: number
}

/** An image with a caption-like text block beneath it. */
export interface TextImageUnit {
  kind: 'text+image'
  text: string
  fields?: string[]
  image: AssetReference
  duration: number
}

/** One renderable item in document order. */
export type ContentUnit = TextUnit | ImageUnit | TextImageUnit

export type ContentUnitKind = ContentUnit['kind']

/** Assets resolved for one unit, handed to the compositor. */
export interface ResolvedAssets {
  image?: CachedAsset
  font?: CachedAsset
}

// ============================================================================
// FRAMES & ARTIFACTS
// ============================================================================

/**
 * A fixed-size raster plus how long it stays on screen.
 *
 * `pixels` is tightly packed RGBA, `width * height * 4` bytes.
 */
export interface Frame {
  width: number
  height: number
  pixels: Buffer
  duration: number
}

/** How many timebase ticks one input frame occupies in the stream. */
export interface FrameTiming {
  index: number
  ticks: number
}

/** The encoded output file and its timing contract. */
export interface VideoArtifact {
  path: string
  container: 'mp4'
  codec: 'h264'
  pixelFormat: 'yuv420p'
  width: number
  height: number
  fps: number
  frames: FrameTiming[]
  totalTicks: number
  /** totalTicks / fps */
  duration: number
  /** Size of the finished file */
  bytes: number
}

// ============================================================================
// PIPELINE
// ============================================================================

/**
 * Orchestrator states. `Resolving` and `Composing` carry the unit index;
 * `Failed` carries the reason.
 */
export type PipelineState =
  | { name: 'Idle' }
  | { name: 'FetchingUnits' }
  | { name: 'Resolving'; unitIndex: number }
  | { name: 'Composing'; unitIndex: number }
  | { name: 'Encoding' }
  | { name: 'Finalized' }
  | { name: 'Failed'; reason: RunError }

export type PipelineStateName = PipelineState['name']

/** A unit that was dropped from the video in non-strict mode. */
export interface SkippedUnit {
  index: number
  kind: PipelineErrorKind
  message: string
}

/** The terminal error of a failed run. */
export interface RunError {
  kind: PipelineErrorKind
  message: string
  unitIndex?: number
}

export type RunReport =
  | {
    state: 'finalized'
    artifact: VideoArtifact
    frameCount: number
    skipped: SkippedUnit[]
    /** Wall-clock run time */
    elapsedMs: number
  }
  | {
    state: 'failed'
    error: RunError
    skipped: SkippedUnit[]
    /** Wall-clock run time */
    elapsedMs: number
  }

// ============================================================================
// LAYOUT
// ============================================================================

/** Canvas regions used for each unit kind. */
export interface LayoutRegions {
  image: Region
  text: Region
  textImage: { image: Region; text: Region }
}

/** A positioned text block that receives one text field of a unit. */
export interface TextSlot {
  region: Region
  color: Rgb
  fontSize: number
  lineHeight: number
}

/** A solid rectangle drawn over the image and under the text of every frame. */
export interface PanelLayer {
  region: Region
  color: Rgb
}

/**
 * Everything the compositor needs besides the unit and its assets.
 * Composition output is a pure function of this, the unit and the asset bytes.
 */
export interface LayoutConfig {
  width: number
  height: number
  background: Rgb
  textColor: Rgb
  /** Rounded panel drawn behind the text region, when set. */
  panelColor?: Rgb
  fontSize: number
  /** Baseline-to-baseline distance in pixels. */
  lineHeight: number
  /** Inner padding of the text region. */
  padding: number
  /** Drawn in place of characters the font has no glyph for. */
  replacementChar: string
  regions: LayoutRegions
  /**
   * Where the fields of table units go, in column order. The last slot takes
   * any remaining fields. Units without fields still use `regions`.
   */
  textSlots?: TextSlot[]
  panels?: PanelLayer[]
}
