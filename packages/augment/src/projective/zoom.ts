import { type Bounds, GeometricMap, WarpkitError } from '@warpkit/geometry'
import { type Distribution, type Rng, sample, uniform } from '../random'
import { numberState } from '../random-state'
import { ProjectiveLeaf } from '../transform'

/**
 * Uniform scale about the centre of the bounds; ratios above 1 magnify.
 * The output bounds enclose the whole scaled extent, so follow with a crop
 * to keep the original frame.
 */
export class Zoom extends ProjectiveLeaf<number> {
  readonly name: string
  readonly scales: Distribution

  constructor(scales: readonly [number, number] | Distribution = [1, 1.2]) {
    super()
    if ('kind' in scales) {
      this.scales = scales
      this.name = `Zoom(${scales.kind})`
    } else {
      const [min, max] = scales
      if (!(min > 0)) throw new WarpkitError(`Zoom: scales must be positive, got ${min}..${max}`)
      this.scales = uniform(min, max)
      this.name = `Zoom(${min}..${max})`
    }
  }

  getRandomState(rng: Rng): number {
    return sample(this.scales, rng)
  }

  checkState(state: unknown): number {
    return numberState(state, this.name)
  }

  getProjection(bounds: Bounds, ratio: number): GeometricMap {
    if (!(ratio > 0)) throw new WarpkitError(`${this.name}: drew non-positive ratio ${ratio}`)
    return GeometricMap.scaling(new Array<number>(bounds.dims).fill(ratio)).recenter(bounds.midpoint())
  }
}
