/**
 * @warpkit/augment: geometric augmentation of images, masks, keypoints
 * and boxes with bounds that stay correct through every transform.
 */

export {
  WarpkitError,
  DimensionMismatchError,
  DegenerateSizeError,
  SingularMapError,
  ShapeMismatchError,
  KindMismatchError,
  RandomStateError,
  PipelineSpecError,
} from './errors'

export {
  type Rng,
  type Distribution,
  createRng,
  defaultRng,
  resetDefaultRng,
  uniform,
  constant,
  choice,
  normal,
  normalSample,
  sample,
  weightedIndex,
} from './random'

export {
  type PixelData,
  type Label,
  type Raster,
  type ImageItem,
  type ArrayItem,
  type MaskBinaryItem,
  type MaskMultiItem,
  type KeypointsItem,
  type PolygonItem,
  type BoundingBoxItem,
  type CategoryItem,
  type ManyItem,
  type RasterItem,
  type PointItem,
  type SpatialItem,
  type Item,
  type ItemKind,
  type RasterOptions,
  image,
  arrayItem,
  maskBinary,
  maskMulti,
  keypoints,
  polygon,
  boundingBox,
  category,
  many,
  isRaster,
  isPointSet,
  getBounds,
  itemData,
  points,
  pixel,
  withRaster,
  withPoints,
} from './items'

export {
  type CompositionTrait,
  type ProjectiveTransform,
  type Identity,
  type Composed,
  type Cropped,
  type Sequence,
  type OneOf,
  type Maybe,
  type MapData,
  type ProjectiveNode,
  type Transform,
  type TransformKind,
  ProjectiveLeaf,
  IDENTITY,
  isProjectiveNode,
  isPure,
  isCropLike,
  describe,
} from './transform'

export {
  type RandomState,
  type ChoiceState,
  type MaybeState,
  getRandomState,
  stateTuple,
  nullState,
  numberState,
  numberTupleState,
  choiceState,
  maybeState,
} from './random-state'

export { type Projection, project, getProjection, projectionBounds } from './projection'
export { type Pipeline, compose, sequence, oneOf, maybe, mapData, pipeline } from './compose'

export { ScaleFixed, ScaleRatio, ScaleKeepAspect } from './projective/scale'
export { Rotate, rotate90, rotate180, rotate270, Reflect, flipX, flipY } from './projective/rotate'
export { Zoom } from './projective/zoom'
export { type Shift, Translate } from './projective/translate'
export { PinOrigin } from './projective/pin-origin'
export {
  type CropSize,
  type CropAnchor,
  Crop,
  CropIndices,
  centerCrop,
  randomCrop,
  cropFixed,
  cropRatio,
  cropDivisible,
  padDivisible,
} from './projective/crop'
export { randomResizeCrop, centerResizeCrop, resizePadDivisible, resizeFixed, resizeRatio } from './presets'

export {
  type Interpolation,
  type Extrapolation,
  type WarpOptions,
  type Resampler,
  defaultResampler,
  allocateLike,
  quantizer,
} from './resample'
export { makeBuffer, copyItemData, checkShapes } from './buffers'
export { type ApplyOptions, apply, applyInPlace } from './apply'
export { Buffered } from './buffered'
export { type BuiltPipeline, buildTransform, buildPipeline, parseTransform } from './spec'
export {
  checkMapAssociativity,
  checkComposeAssociativity,
  checkLeftIdentity,
  checkRightIdentity,
  checkInvolution,
} from './laws'
export { engineLogger, setEngineLogger } from './log'
