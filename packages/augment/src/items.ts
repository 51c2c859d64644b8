/**
 * Items: typed (data, Bounds) pairs.
 *
 * Rasters store their samples row-major with channels interleaved, indexed
 * relative to `bounds` (index 0 along an axis is `bounds.ranges[axis][0]`).
 * Point sets store coordinates flat, `dims` numbers per point, in the same
 * axis order as the bounds.
 */

import { Bounds, type Point, assertValidSize, DimensionMismatchError } from '@warpkit/geometry'
import { ShapeMismatchError, WarpkitError } from './errors'

export type PixelData =
  | Float32Array
  | Float64Array
  | Uint8Array
  | Uint8ClampedArray
  | Uint16Array
  | Int16Array
  | Int32Array
  | Uint32Array

export type Label = string | number

/** Raster view consumed by resamplers. */
export interface Raster {
  readonly data: PixelData
  /** Spatial size per axis; always equal to `bounds.lengths()`. */
  readonly size: readonly number[]
  readonly channels: number
  readonly bounds: Bounds
}

export interface ImageItem extends Raster {
  readonly kind: 'image'
}

/** Single-channel numeric raster without colour semantics. */
export interface ArrayItem extends Raster {
  readonly kind: 'array'
}

export interface MaskBinaryItem extends Raster {
  readonly kind: 'mask-binary'
}

export interface MaskMultiItem extends Raster {
  readonly kind: 'mask-multi'
  readonly classes: readonly Label[]
}

interface PointSet {
  readonly data: Float64Array
  readonly bounds: Bounds
}

/** NaN coordinates mark a missing keypoint. */
export interface KeypointsItem extends PointSet {
  readonly kind: 'keypoints'
}

export interface PolygonItem extends PointSet {
  readonly kind: 'polygon'
}

/** Lower corner followed by upper corner. */
export interface BoundingBoxItem extends PointSet {
  readonly kind: 'bounding-box'
}

export interface CategoryItem {
  readonly kind: 'category'
  readonly label: Label
  readonly classes: readonly Label[]
}

/** Sub-items transformed in lockstep with one shared random state. */
export interface ManyItem {
  readonly kind: 'many'
  readonly items: readonly Item[]
}

export type RasterItem = ImageItem | ArrayItem | MaskBinaryItem | MaskMultiItem
export type PointItem = KeypointsItem | PolygonItem | BoundingBoxItem
export type SpatialItem = RasterItem | PointItem
export type Item = SpatialItem | CategoryItem | ManyItem
export type ItemKind = Item['kind']

// ─── Validation ─────────────────────────────────────────────────────────────

function product(values: readonly number[]): number {
  return values.reduce((a, b) => a * b, 1)
}

function checkRaster(
  data: PixelData,
  size: readonly number[],
  channels: number,
  bounds: Bounds,
  context: string,
): void {
  assertValidSize(size, context)
  if (!Number.isInteger(channels) || channels <= 0) {
    throw new WarpkitError(`${context}: channels must be a positive integer, got ${channels}`)
  }
  const expected = product(size) * channels
  if (data.length !== expected) {
    throw new ShapeMismatchError([expected], [data.length], `${context} data length`)
  }
  const lengths = bounds.lengths()
  if (lengths.length !== size.length || lengths.some((n, i) => n !== size[i])) {
    throw new ShapeMismatchError(size, lengths, `${context} bounds`)
  }
}

function flattenPoints(points: readonly (Point | null)[], dims: number, context: string): Float64Array {
  const data = new Float64Array(points.length * dims)
  points.forEach((p, i) => {
    if (p === null) {
      data.fill(Number.NaN, i * dims, (i + 1) * dims)
      return
    }
    if (p.length !== dims) throw new DimensionMismatchError(dims, p.length, `${context} point ${i}`)
    data.set(p, i * dims)
  })
  return data
}

// ─── Constructors ───────────────────────────────────────────────────────────

export interface RasterOptions {
  channels?: number
  /** Defaults to zero-based bounds of `size`. */
  bounds?: Bounds
}

export function image(data: PixelData, size: readonly number[], options: RasterOptions = {}): ImageItem {
  const channels = options.channels ?? 1
  const bounds = options.bounds ?? Bounds.fromSize(size)
  checkRaster(data, size, channels, bounds, 'image')
  return { kind: 'image', data, size: [...size], channels, bounds }
}

export function arrayItem(data: PixelData, size: readonly number[], bounds?: Bounds): ArrayItem {
  const b = bounds ?? Bounds.fromSize(size)
  checkRaster(data, size, 1, b, 'arrayItem')
  return { kind: 'array', data, size: [...size], channels: 1, bounds: b }
}

export function maskBinary(data: PixelData, size: readonly number[], bounds?: Bounds): MaskBinaryItem {
  const b = bounds ?? Bounds.fromSize(size)
  checkRaster(data, size, 1, b, 'maskBinary')
  return { kind: 'mask-binary', data, size: [...size], channels: 1, bounds: b }
}

export function maskMulti(
  data: PixelData,
  size: readonly number[],
  classes: readonly Label[],
  bounds?: Bounds,
): MaskMultiItem {
  const b = bounds ?? Bounds.fromSize(size)
  checkRaster(data, size, 1, b, 'maskMulti')
  for (let i = 0; i < data.length; i++) {
    const v = data[i]
    if (!Number.isInteger(v) || v < 0 || v >= classes.length) {
      throw new WarpkitError(`maskMulti: value ${v} at ${i} is not a class index below ${classes.length}`)
    }
  }
  return { kind: 'mask-multi', data, size: [...size], channels: 1, classes: [...classes], bounds: b }
}

/** Keypoints inside `bounds`; `null` entries are missing keypoints. */
export function keypoints(points: readonly (Point | null)[], bounds: Bounds): KeypointsItem {
  return { kind: 'keypoints', data: flattenPoints(points, bounds.dims, 'keypoints'), bounds }
}

export function polygon(vertices: readonly Point[], bounds: Bounds): PolygonItem {
  return { kind: 'polygon', data: flattenPoints(vertices, bounds.dims, 'polygon'), bounds }
}

export function boundingBox(lower: Point, upper: Point, bounds: Bounds): BoundingBoxItem {
  const data = flattenPoints([lower, upper], bounds.dims, 'boundingBox')
  if (lower.some((v, i) => v > upper[i])) {
    throw new WarpkitError(`boundingBox: lower corner (${lower.join(', ')}) exceeds upper corner (${upper.join(', ')})`)
  }
  return { kind: 'bounding-box', data, bounds }
}

export function category(label: Label, classes: readonly Label[] = []): CategoryItem {
  if (classes.length > 0 && !classes.includes(label)) {
    throw new WarpkitError(`category: label ${label} is not one of the classes`)
  }
  return { kind: 'category', label, classes: [...classes] }
}

export function many(items: readonly Item[]): ManyItem {
  return { kind: 'many', items: [...items] }
}

// ─── Accessors ──────────────────────────────────────────────────────────────

export function isRaster(item: Item): item is RasterItem {
  return item.kind === 'image' || item.kind === 'array' || item.kind === 'mask-binary' || item.kind === 'mask-multi'
}

export function isPointSet(item: Item): item is PointItem {
  return item.kind === 'keypoints' || item.kind === 'polygon' || item.kind === 'bounding-box'
}

/** Bounds of a spatial item; `null` for categories and collections. */
export function getBounds(item: Item): Bounds | null {
  return isRaster(item) || isPointSet(item) ? item.bounds : null
}

/** Data of a spatial item; `null` for categories and collections. */
export function itemData(item: Item): PixelData | Float64Array | null {
  return isRaster(item) || isPointSet(item) ? item.data : null
}

/** Points of a point-set item; missing keypoints come back as `null`. */
export function points(item: PointItem): (number[] | null)[] {
  const dims = item.bounds.dims
  const out: (number[] | null)[] = []
  for (let i = 0; i < item.data.length; i += dims) {
    const p = Array.from(item.data.subarray(i, i + dims))
    out.push(p.some(Number.isNaN) ? null : p)
  }
  return out
}

/** Sample of a raster at absolute coordinates `at` and channel `channel`. */
export function pixel(item: Raster, at: readonly number[], channel = 0): number {
  let offset = 0
  for (let d = 0; d < item.size.length; d++) {
    const i = at[d] - item.bounds.ranges[d][0]
    if (i < 0 || i >= item.size[d]) {
      throw new WarpkitError(`pixel: ${at.join(', ')} lies outside ${item.bounds.toString()}`)
    }
    offset = offset * item.size[d] + i
  }
  return item.data[offset * item.channels + channel]
}

/** Replace data and bounds of a raster, keeping its kind and metadata. */
export function withRaster(item: RasterItem, data: PixelData, bounds: Bounds): RasterItem {
  return { ...item, data, size: bounds.lengths(), bounds }
}

export function withPoints(item: PointItem, data: Float64Array, bounds: Bounds): PointItem {
  return { ...item, data, bounds }
}
