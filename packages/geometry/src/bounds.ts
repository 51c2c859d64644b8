/**
 * Bounds: the N-dimensional, axis-aligned extent of an item's data.
 *
 * Each axis holds an inclusive integer index range [lo, hi]. Index i
 * covers the continuous interval [i - 0.5, i + 0.5], so an axis of length
 * n spans [lo - 0.5, hi + 0.5] in map coordinates.
 */

import type { GeometricMap } from './map'
import { DimensionMismatchError, WarpkitError, assertValidSize } from './errors'

export type Range = readonly [number, number]

/** Values closer than this to an integer are treated as that integer. */
const SNAP_TOLERANCE = 1e-6

export function snap(x: number): number {
  const r = Math.round(x)
  return Math.abs(x - r) < SNAP_TOLERANCE ? r : x
}

export class Bounds {
  readonly ranges: readonly Range[]

  constructor(ranges: readonly Range[]) {
    for (const [lo, hi] of ranges) {
      if (!Number.isFinite(lo) || !Number.isFinite(hi) || hi < lo) {
        throw new WarpkitError(`Bounds: invalid range ${lo}:${hi}`)
      }
    }
    this.ranges = ranges.map(([lo, hi]) => [lo, hi] as const)
  }

  /** Zero-based bounds of an array with the given size. */
  static fromSize(size: readonly number[]): Bounds {
    assertValidSize(size, 'Bounds.fromSize')
    return new Bounds(size.map((n) => [0, n - 1] as const))
  }

  get dims(): number {
    return this.ranges.length
  }

  lengths(): number[] {
    return this.ranges.map(([lo, hi]) => hi - lo + 1)
  }

  mins(): number[] {
    return this.ranges.map(([lo]) => lo)
  }

  maxs(): number[] {
    return this.ranges.map(([, hi]) => hi)
  }

  midpoint(): number[] {
    return this.ranges.map(([lo, hi]) => (lo + hi) / 2)
  }

  /** The 2^N corners of the continuous extent. */
  corners(): number[][] {
    let out: number[][] = [[]]
    for (const [lo, hi] of this.ranges) {
      const next: number[][] = []
      for (const prefix of out) {
        next.push([...prefix, lo - 0.5], [...prefix, hi + 0.5])
      }
      out = next
    }
    return out
  }

  equals(other: Bounds): boolean {
    return other.dims === this.dims &&
      this.ranges.every(([lo, hi], i) => other.ranges[i][0] === lo && other.ranges[i][1] === hi)
  }

  translate(offsets: readonly number[]): Bounds {
    if (offsets.length !== this.dims) {
      throw new DimensionMismatchError(this.dims, offsets.length, 'Bounds.translate')
    }
    return new Bounds(this.ranges.map(([lo, hi], i) => [lo + offsets[i], hi + offsets[i]] as const))
  }

  toString(): string {
    return `Bounds(${this.ranges.map(([lo, hi]) => `${lo}:${hi}`).join(', ')})`
  }
}

// ─── Bounds algebra ─────────────────────────────────────────────────────────

/**
 * Minimal integer bounds enclosing the image of `bounds` under `map`.
 * Every corner of the continuous extent is mapped; an index is kept when
 * its pixel overlaps the mapped extent.
 */
export function transformBounds(bounds: Bounds, map: GeometricMap): Bounds {
  if (map.dims !== bounds.dims) {
    throw new DimensionMismatchError(bounds.dims, map.dims, 'transformBounds')
  }
  const mapped = bounds.corners().map((c) => map.apply(c))
  const ranges: Range[] = []
  for (let d = 0; d < bounds.dims; d++) {
    let min = Infinity
    let max = -Infinity
    for (const p of mapped) {
      if (p[d] < min) min = p[d]
      if (p[d] > max) max = p[d]
    }
    const lo = Math.floor(snap(min + 0.5))
    const hi = Math.ceil(snap(max - 0.5))
    ranges.push([lo, Math.max(lo, hi)])
  }
  return new Bounds(ranges)
}

/**
 * Bounds of exactly `size`, placed inside (or around) `bounds`.
 *
 * `offsets[i]` positions the window along the slack `length - size` of
 * axis i: 0 aligns with the lower edge, 1 with the upper edge, 0.5 centres.
 * A window larger than the data has negative slack and extends past it.
 */
export function offsetCropBounds(
  size: readonly number[],
  bounds: Bounds,
  offsets: readonly number[],
): Bounds {
  assertValidSize(size, 'offsetCropBounds')
  if (size.length !== bounds.dims) {
    throw new DimensionMismatchError(bounds.dims, size.length, 'offsetCropBounds size')
  }
  if (offsets.length !== bounds.dims) {
    throw new DimensionMismatchError(bounds.dims, offsets.length, 'offsetCropBounds offsets')
  }
  const lengths = bounds.lengths()
  if (lengths.every((n, i) => n === size[i])) return bounds

  return new Bounds(bounds.ranges.map(([lo], i) => {
    const start = lo + Math.floor(snap((lengths[i] - size[i]) * offsets[i]))
    return [start, start + size[i] - 1] as const
  }))
}
