import { type Bounds, GeometricMap } from '@warpkit/geometry'
import { nullState } from '../random-state'
import { type CompositionTrait, ProjectiveLeaf } from '../transform'

/**
 * Shift so the bounds start at index 0 on every axis. Rasters are only
 * relabelled. Composing anything before it starts a new step, which keeps
 * the shift integral.
 */
export class PinOrigin extends ProjectiveLeaf<null> {
  readonly name = 'PinOrigin'
  override readonly trait: CompositionTrait = 'barrier'

  getRandomState(): null {
    return null
  }

  checkState(state: unknown): null {
    return nullState(state, this.name)
  }

  getProjection(bounds: Bounds): GeometricMap {
    return GeometricMap.translation(bounds.mins().map((lo) => -lo))
  }

  override projectionBounds(_map: GeometricMap, bounds: Bounds): Bounds {
    return bounds.translate(bounds.mins().map((lo) => -lo))
  }
}
