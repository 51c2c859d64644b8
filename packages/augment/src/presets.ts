/**
 * Common resize and crop pipelines. Each ends with PinOrigin, so outputs
 * always start at index 0.
 */

import { compose } from './compose'
import { centerCrop, padDivisible, randomCrop } from './projective/crop'
import { PinOrigin } from './projective/pin-origin'
import { ScaleFixed, ScaleKeepAspect, ScaleRatio } from './projective/scale'
import type { Transform } from './transform'

/** Resize so the shorter side fits, then take a random `size` window. */
export function randomResizeCrop(size: readonly number[]): Transform {
  return compose(new ScaleKeepAspect(size), randomCrop(size), new PinOrigin())
}

/** Resize so the shorter side fits, then take the centred `size` window. */
export function centerResizeCrop(size: readonly number[]): Transform {
  return compose(new ScaleKeepAspect(size), centerCrop(size), new PinOrigin())
}

/** Resize so the shorter side fits, then pad every side up to a multiple of `by`. */
export function resizePadDivisible(size: readonly number[], by: number): Transform {
  return compose(new ScaleKeepAspect(size), padDivisible(by, size.length), new PinOrigin())
}

export function resizeFixed(size: readonly number[]): Transform {
  return compose(new ScaleFixed(size), new PinOrigin())
}

export function resizeRatio(ratios: readonly number[]): Transform {
  return compose(new ScaleRatio(ratios), new PinOrigin())
}
