import { type Bounds, GeometricMap, WarpkitError, assertDims } from '@warpkit/geometry'
import type { Rng } from '../random'
import { numberTupleState } from '../random-state'
import { ProjectiveLeaf } from '../transform'

/** A fixed shift, or a `[min, max]` range drawn uniformly. */
export type Shift = number | readonly [number, number]

/** Per-axis translation. Fixed shifts do not consume the random source. */
export class Translate extends ProjectiveLeaf<number[]> {
  readonly name: string
  readonly shifts: readonly Shift[]

  constructor(shifts: readonly Shift[]) {
    super()
    if (shifts.length === 0) throw new WarpkitError('Translate: at least one axis is required')
    for (const s of shifts) {
      if (typeof s !== 'number' && s[0] > s[1]) {
        throw new WarpkitError(`Translate: range ${s[0]}..${s[1]} is reversed`)
      }
    }
    this.shifts = [...shifts]
    this.name = `Translate(${shifts.map((s) => (typeof s === 'number' ? s : `${s[0]}..${s[1]}`)).join(', ')})`
  }

  getRandomState(rng: Rng): number[] {
    return this.shifts.map((s) => (typeof s === 'number' ? s : s[0] + (s[1] - s[0]) * rng()))
  }

  checkState(state: unknown): number[] {
    return numberTupleState(state, this.shifts.length, this.name)
  }

  getProjection(bounds: Bounds, offsets: number[]): GeometricMap {
    assertDims(this.shifts.length, bounds.dims, this.name)
    return GeometricMap.translation(offsets)
  }
}
