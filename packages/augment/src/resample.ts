/**
 * Resampling of raster data through a GeometricMap.
 *
 * Inverse mapping: every output pixel centre is pulled back through the
 * inverse map and sampled from the source. A source point lies inside the
 * data when its local coordinate is within [-0.5, size - 0.5] on every axis.
 */

import { type Bounds, type GeometricMap, WarpkitError } from '@warpkit/geometry'
import { ShapeMismatchError } from './errors'
import type { PixelData, Raster } from './items'

export type Interpolation = 'nearest' | 'linear'

export type Extrapolation =
  | { readonly kind: 'constant'; readonly value: number }
  | { readonly kind: 'replicate' }

export interface WarpOptions {
  readonly interpolation: Interpolation
  readonly extrapolation: Extrapolation
}

export interface Resampler {
  /**
   * Sample `raster` through `map` onto `outBounds`. Writes into `out` when
   * given (its length must match) and returns the written data.
   */
  warp(raster: Raster, map: GeometricMap, outBounds: Bounds, options: WarpOptions, out?: PixelData): PixelData
}

/** Fresh zeroed storage of the same element type. */
export function allocateLike(data: PixelData, length: number): PixelData {
  if (data instanceof Float64Array) return new Float64Array(length)
  if (data instanceof Float32Array) return new Float32Array(length)
  if (data instanceof Uint8ClampedArray) return new Uint8ClampedArray(length)
  if (data instanceof Uint8Array) return new Uint8Array(length)
  if (data instanceof Uint16Array) return new Uint16Array(length)
  if (data instanceof Int16Array) return new Int16Array(length)
  if (data instanceof Int32Array) return new Int32Array(length)
  return new Uint32Array(length)
}

function integerRange(data: PixelData): readonly [number, number] | null {
  if (data instanceof Uint8Array || data instanceof Uint8ClampedArray) return [0, 255]
  if (data instanceof Uint16Array) return [0, 65535]
  if (data instanceof Int16Array) return [-32768, 32767]
  if (data instanceof Int32Array) return [-2147483648, 2147483647]
  if (data instanceof Uint32Array) return [0, 4294967295]
  return null
}

/**
 * Conversion of a computed sample to what `data` stores: integer arrays
 * round and saturate at their element range, float arrays keep the value.
 */
export function quantizer(data: PixelData): (value: number) => number {
  const range = integerRange(data)
  if (range === null) return (value) => value
  const [min, max] = range
  return (value) => Math.min(max, Math.max(min, Math.round(value)))
}

function product(values: readonly number[]): number {
  return values.reduce((a, b) => a * b, 1)
}

// ─── Default resampler ──────────────────────────────────────────────────────

/** N-dimensional nearest / N-linear resampler. */
export const defaultResampler: Resampler = {
  warp(raster, map, outBounds, options, out) {
    const dims = raster.size.length
    if (map.dims !== dims || outBounds.dims !== dims) {
      throw new WarpkitError(`warp: map (${map.dims}d), raster (${dims}d) and bounds (${outBounds.dims}d) disagree`)
    }
    const outSize = outBounds.lengths()
    const channels = raster.channels
    const length = product(outSize) * channels
    if (out !== undefined && out.length !== length) {
      throw new ShapeMismatchError([length], [out.length], 'warp output')
    }
    const target = out ?? allocateLike(raster.data, length)

    const inv = map.inverse().matrix
    const srcMins = raster.bounds.mins()
    const outMins = outBounds.mins()
    const strides = new Array<number>(dims)
    let stride = channels
    for (let d = dims - 1; d >= 0; d--) {
      strides[d] = stride
      stride *= raster.size[d]
    }
    const store = quantizer(target)
    const { interpolation, extrapolation } = options

    const idx = new Array<number>(dims).fill(0)
    const p = new Array<number>(dims + 1).fill(1)
    const local = new Array<number>(dims)
    const values = new Array<number>(channels)

    for (let o = 0; o < length; o += channels) {
      for (let d = 0; d < dims; d++) p[d] = outMins[d] + idx[d]

      let w = 0
      for (let c = 0; c <= dims; c++) w += inv[dims][c] * p[c]
      let inside = true
      for (let d = 0; d < dims; d++) {
        let s = 0
        for (let c = 0; c <= dims; c++) s += inv[d][c] * p[c]
        const x = s / w - srcMins[d]
        if (!(x >= -0.5 && x <= raster.size[d] - 0.5)) inside = false
        local[d] = Math.min(Math.max(x, 0), raster.size[d] - 1)
      }

      if (!inside && extrapolation.kind === 'constant') {
        values.fill(extrapolation.value)
      } else if (interpolation === 'nearest') {
        sampleNearest(raster, local, strides, values)
      } else {
        sampleLinear(raster, local, strides, values)
      }
      for (let c = 0; c < channels; c++) target[o + c] = store(values[c])

      for (let d = dims - 1; d >= 0; d--) {
        if (++idx[d] < outSize[d]) break
        idx[d] = 0
      }
    }
    return target
  },
}

function sampleNearest(raster: Raster, local: readonly number[], strides: readonly number[], out: number[]): void {
  let base = 0
  for (let d = 0; d < local.length; d++) {
    base += Math.min(Math.round(local[d]), raster.size[d] - 1) * strides[d]
  }
  for (let c = 0; c < raster.channels; c++) out[c] = raster.data[base + c]
}

function sampleLinear(raster: Raster, local: readonly number[], strides: readonly number[], out: number[]): void {
  const dims = local.length
  out.fill(0)
  // Visit the 2^N neighbours; bit d of `corner` selects the upper one on axis d.
  for (let corner = 0; corner < 1 << dims; corner++) {
    let weight = 1
    let base = 0
    for (let d = 0; d < dims; d++) {
      const i0 = Math.floor(local[d])
      const t = local[d] - i0
      const upper = (corner >> d) & 1
      weight *= upper ? t : 1 - t
      base += Math.min(i0 + upper, raster.size[d] - 1) * strides[d]
    }
    if (weight === 0) continue
    for (let c = 0; c < raster.channels; c++) out[c] += weight * raster.data[base + c]
  }
}
