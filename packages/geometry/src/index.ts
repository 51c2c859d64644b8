/**
 * @warpkit/geometry: coordinate extents and composable projective maps.
 */

export {
  WarpkitError,
  DimensionMismatchError,
  DegenerateSizeError,
  SingularMapError,
  assertValidSize,
  assertDims,
} from './errors'

export {
  type Matrix,
  identityMatrix,
  cloneMatrix,
  multiply,
  multiplyVector,
  invert,
  roundMatrix,
} from './matrix'

export { type Point, GeometricMap, composeMaps } from './map'

export { type Range, Bounds, snap, transformBounds, offsetCropBounds } from './bounds'
