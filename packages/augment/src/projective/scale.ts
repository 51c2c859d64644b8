/**
 * Resizing transforms.
 *
 * ScaleFixed and ScaleKeepAspect scale about the upper-left corner of the
 * continuous extent, so the result starts at index 0:
 *
 *   x' = (x - lo + 0.5) * r - 0.5
 */

import {
  Bounds,
  DegenerateSizeError,
  GeometricMap,
  assertDims,
  assertValidSize,
  offsetCropBounds,
  snap,
} from '@warpkit/geometry'
import { nullState } from '../random-state'
import { ProjectiveLeaf } from '../transform'

function sameLengths(bounds: Bounds, sizes: readonly number[]): boolean {
  return bounds.lengths().every((n, i) => n === sizes[i])
}

/** Scale with per-axis `ratios`, anchored so the extent starts at -0.5. */
function cornerScaling(bounds: Bounds, ratios: readonly number[]): GeometricMap {
  const a = ratios.map((r, i) => ratios.map((_, j) => (i === j ? r : 0)))
  const offset = bounds.mins().map((lo, i) => (-lo + 0.5) * ratios[i] - 0.5)
  return GeometricMap.linear(a, offset)
}

function centred(dims: number): number[] {
  return new Array<number>(dims).fill(0.5)
}

// ─── ScaleFixed ─────────────────────────────────────────────────────────────

/** Resize to exactly `sizes`; bounds become `[0, size - 1]` per axis. */
export class ScaleFixed extends ProjectiveLeaf<null> {
  readonly name: string
  readonly sizes: readonly number[]

  constructor(sizes: readonly number[]) {
    super()
    assertValidSize(sizes, 'ScaleFixed')
    this.sizes = [...sizes]
    this.name = `ScaleFixed(${sizes.join('x')})`
  }

  getRandomState(): null {
    return null
  }

  checkState(state: unknown): null {
    return nullState(state, this.name)
  }

  getProjection(bounds: Bounds): GeometricMap {
    assertDims(this.sizes.length, bounds.dims, this.name)
    if (sameLengths(bounds, this.sizes)) return GeometricMap.identity(bounds.dims)
    const lengths = bounds.lengths()
    return cornerScaling(bounds, this.sizes.map((s, i) => s / lengths[i]))
  }

  override projectionBounds(map: GeometricMap, bounds: Bounds): Bounds {
    if (sameLengths(bounds, this.sizes)) return bounds
    return offsetCropBounds(this.sizes, super.projectionBounds(map, bounds, null), centred(bounds.dims))
  }
}

// ─── ScaleRatio ─────────────────────────────────────────────────────────────

/** Per-axis scale about the origin. */
export class ScaleRatio extends ProjectiveLeaf<null> {
  readonly name: string
  readonly ratios: readonly number[]

  constructor(ratios: readonly number[]) {
    super()
    if (ratios.length === 0 || ratios.some((r) => !Number.isFinite(r) || r <= 0)) {
      throw new DegenerateSizeError(ratios, 'ScaleRatio')
    }
    this.ratios = [...ratios]
    this.name = `ScaleRatio(${ratios.join(', ')})`
  }

  getRandomState(): null {
    return null
  }

  checkState(state: unknown): null {
    return nullState(state, this.name)
  }

  getProjection(bounds: Bounds): GeometricMap {
    assertDims(this.ratios.length, bounds.dims, this.name)
    return GeometricMap.scaling(this.ratios)
  }
}

// ─── ScaleKeepAspect ────────────────────────────────────────────────────────

/**
 * Uniform resize so that every side is at least `minLengths[i]`. The
 * aspect ratio is kept up to rounding of the output lengths.
 */
export class ScaleKeepAspect extends ProjectiveLeaf<null> {
  readonly name: string
  readonly minLengths: readonly number[]

  constructor(minLengths: readonly number[]) {
    super()
    assertValidSize(minLengths, 'ScaleKeepAspect')
    this.minLengths = [...minLengths]
    this.name = `ScaleKeepAspect(${minLengths.join('x')})`
  }

  getRandomState(): null {
    return null
  }

  checkState(state: unknown): null {
    return nullState(state, this.name)
  }

  ratio(bounds: Bounds): number {
    const lengths = bounds.lengths()
    return Math.max(...this.minLengths.map((m, i) => m / lengths[i]))
  }

  getProjection(bounds: Bounds): GeometricMap {
    assertDims(this.minLengths.length, bounds.dims, this.name)
    if (sameLengths(bounds, this.minLengths)) return GeometricMap.identity(bounds.dims)
    const r = this.ratio(bounds)
    return cornerScaling(bounds, this.minLengths.map(() => r))
  }

  override projectionBounds(map: GeometricMap, bounds: Bounds): Bounds {
    if (sameLengths(bounds, this.minLengths)) return bounds
    const r = this.ratio(bounds)
    const size = bounds.lengths().map((n) => Math.floor(snap(r * n)))
    return offsetCropBounds(size, super.projectionBounds(map, bounds, null), centred(bounds.dims))
  }
}
