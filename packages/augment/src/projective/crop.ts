/**
 * Crop windows. A crop never moves data: its map is the identity and only
 * the bounds change. Windows larger than the data pad it.
 *
 * Size policy:   fixed | ratio (rounded) | divisible (ceil or floor to a multiple)
 * Anchor policy: center | origin | random | explicit offsets in [0, 1]
 */

import {
  Bounds,
  DegenerateSizeError,
  GeometricMap,
  type Range,
  WarpkitError,
  assertDims,
  assertValidSize,
  offsetCropBounds,
} from '@warpkit/geometry'
import type { CropAnchorSpec, CropSizeSpec } from '@warpkit/shared'
import type { Rng } from '../random'
import { nullState, numberTupleState } from '../random-state'
import { type CompositionTrait, ProjectiveLeaf } from '../transform'

export type CropSize = CropSizeSpec
export type CropAnchor = CropAnchorSpec

function policyDims(size: CropSize): number {
  switch (size.kind) {
    case 'fixed':
      return size.size.length
    case 'ratio':
      return size.ratios.length
    case 'divisible':
      return size.dims ?? 2
  }
}

function validatePolicy(size: CropSize): void {
  switch (size.kind) {
    case 'fixed':
      assertValidSize(size.size, 'Crop')
      return
    case 'ratio':
      if (size.ratios.length === 0 || size.ratios.some((r) => !Number.isFinite(r) || r <= 0)) {
        throw new DegenerateSizeError(size.ratios, 'Crop ratio')
      }
      return
    case 'divisible':
      assertValidSize([size.by], 'Crop divisible')
      return
  }
}

function describeSize(size: CropSize): string {
  switch (size.kind) {
    case 'fixed':
      return size.size.join('x')
    case 'ratio':
      return `ratio ${size.ratios.join(', ')}`
    case 'divisible':
      return `divisible by ${size.by}${size.rounding === 'floor' ? ' (floor)' : ''}`
  }
}

/**
 * Offset of a uniformly drawn window position. `u` in [0, 1) picks one of
 * the `|slack| + 1` integer positions along the axis.
 */
function randomOffset(u: number, slack: number): number {
  if (slack === 0) return 0
  const span = Math.abs(slack)
  return Math.min(span, Math.floor(u * (span + 1))) / span
}

export class Crop extends ProjectiveLeaf<number[] | null> {
  readonly name: string
  override readonly trait: CompositionTrait = 'crop'
  readonly dims: number

  constructor(
    readonly size: CropSize,
    readonly anchor: CropAnchor = 'center',
  ) {
    super()
    validatePolicy(size)
    this.dims = policyDims(size)
    if (typeof anchor === 'object') {
      assertDims(this.dims, anchor.offsets.length, 'Crop offsets')
      if (anchor.offsets.some((o) => !(o >= 0 && o <= 1))) {
        throw new WarpkitError(`Crop: offsets must lie in [0, 1], got ${anchor.offsets.join(', ')}`)
      }
    }
    const where = typeof anchor === 'object' ? `at ${anchor.offsets.join(', ')}` : anchor
    this.name = `Crop(${describeSize(size)}, ${where})`
  }

  getRandomState(rng: Rng): number[] | null {
    if (this.anchor !== 'random') return null
    return Array.from({ length: this.dims }, () => rng())
  }

  checkState(state: unknown): number[] | null {
    if (this.anchor !== 'random') return nullState(state, this.name)
    return numberTupleState(state, this.dims, this.name)
  }

  /** Window size for data with the given bounds. */
  windowSize(bounds: Bounds): number[] {
    const size = this.sizeFor(bounds.lengths())
    assertValidSize(size, this.name)
    return size
  }

  private sizeFor(lengths: readonly number[]): number[] {
    switch (this.size.kind) {
      case 'fixed':
        return [...this.size.size]
      case 'ratio': {
        const ratios = this.size.ratios
        return lengths.map((n, i) => Math.round(n * ratios[i]))
      }
      case 'divisible': {
        const { by, rounding } = this.size
        const round = rounding === 'floor' ? Math.floor : Math.ceil
        return lengths.map((n) => round(n / by) * by)
      }
    }
  }

  getProjection(bounds: Bounds): GeometricMap {
    assertDims(this.dims, bounds.dims, this.name)
    this.windowSize(bounds)
    return GeometricMap.identity(bounds.dims)
  }

  override projectionBounds(_map: GeometricMap, bounds: Bounds, state: number[] | null): Bounds {
    const size = this.windowSize(bounds)
    const lengths = bounds.lengths()
    let offsets: number[]
    if (this.anchor === 'center') offsets = size.map(() => 0.5)
    else if (this.anchor === 'origin') offsets = size.map(() => 0)
    else if (this.anchor === 'random') {
      const draws = this.checkState(state) ?? size.map(() => 0.5)
      offsets = draws.map((u, i) => randomOffset(u, lengths[i] - size[i]))
    } else offsets = [...this.anchor.offsets]
    return offsetCropBounds(size, bounds, offsets)
  }
}

/** Crop to absolute index ranges. */
export class CropIndices extends ProjectiveLeaf<null> {
  readonly name: string
  override readonly trait: CompositionTrait = 'crop'
  readonly window: Bounds

  constructor(ranges: readonly Range[]) {
    super()
    if (ranges.some(([lo, hi]) => !Number.isInteger(lo) || !Number.isInteger(hi))) {
      throw new WarpkitError(`CropIndices: ranges must be integer indices, got ${ranges.map((r) => r.join(':')).join(', ')}`)
    }
    this.window = new Bounds(ranges)
    this.name = `CropIndices(${ranges.map(([lo, hi]) => `${lo}:${hi}`).join(', ')})`
  }

  getRandomState(): null {
    return null
  }

  checkState(state: unknown): null {
    return nullState(state, this.name)
  }

  getProjection(bounds: Bounds): GeometricMap {
    assertDims(this.window.dims, bounds.dims, this.name)
    return GeometricMap.identity(bounds.dims)
  }

  override projectionBounds(): Bounds {
    return this.window
  }
}

// ─── Presets ────────────────────────────────────────────────────────────────

export function centerCrop(size: readonly number[]): Crop {
  return new Crop({ kind: 'fixed', size: [...size] }, 'center')
}

export function randomCrop(size: readonly number[]): Crop {
  return new Crop({ kind: 'fixed', size: [...size] }, 'random')
}

export function cropFixed(size: readonly number[], anchor: CropAnchor = 'center'): Crop {
  return new Crop({ kind: 'fixed', size: [...size] }, anchor)
}

export function cropRatio(ratios: readonly number[], anchor: CropAnchor = 'center'): Crop {
  return new Crop({ kind: 'ratio', ratios: [...ratios] }, anchor)
}

/** Crop each side down to a multiple of `by`, centred. */
export function cropDivisible(by: number, dims = 2): Crop {
  return new Crop({ kind: 'divisible', by, dims, rounding: 'floor' }, 'center')
}

/** Pad each side up to a multiple of `by`, keeping the data at the origin. */
export function padDivisible(by: number, dims = 2): Crop {
  return new Crop({ kind: 'divisible', by, dims, rounding: 'ceil' }, 'origin')
}
