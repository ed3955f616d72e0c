import type { FrameTiming } from '../types/index.js'

/**
 * Quantize per-frame durations (seconds) to whole ticks of `1 / fps`.
 *
 * Rounding error is carried forward: frame `i` ends at
 * `round(fps * (d0 + … + di))` ticks, so the total never drifts more than half
 * a tick from the exact sum. Every frame gets at least one tick, so a frame is
 * never dropped, which can only lengthen the output when a duration is
 * shorter than one tick.
 */
export function quantizeDurations(durations: readonly number[], fps: number): FrameTiming[] {
  if (!(fps > 0)) throw new Error(`fps must be positive, got ${fps}`)

  const timings: FrameTiming[] = []
  let elapsed = 0
  let emitted = 0

  durations.forEach((duration, index) => {
    if (!(duration > 0) || !Number.isFinite(duration)) {
      throw new Error(`Frame ${index} has invalid duration ${duration}`)
    }
    elapsed += duration
    const end = Math.round(elapsed * fps)
    const ticks = Math.max(1, end - emitted)
    emitted += ticks
    timings.push({ index, ticks })
  })

  return timings
}

export function totalTicks(timings: readonly FrameTiming[]): number {
  return timings.reduce((sum, t) => sum + t.ticks, 0)
}

/** Seconds covered by a tick count. */
export function ticksToSeconds(ticks: number, fps: number): number {
  return ticks / fps
}
