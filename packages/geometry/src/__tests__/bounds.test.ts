import { describe, it, expect } from 'vitest'
import {
  Bounds,
  GeometricMap,
  transformBounds,
  offsetCropBounds,
  DegenerateSizeError,
  DimensionMismatchError,
  WarpkitError,
} from '../index'

describe('Bounds', () => {
  it('fromSize produces zero-based inclusive ranges', () => {
    const b = Bounds.fromSize([3, 4])
    expect(b.ranges).toEqual([[0, 2], [0, 3]])
    expect(b.lengths()).toEqual([3, 4])
    expect(b.dims).toBe(2)
  })

  it('rejects empty sizes and inverted ranges', () => {
    expect(() => Bounds.fromSize([0, 4])).toThrow(DegenerateSizeError)
    expect(() => new Bounds([[3, 1]])).toThrow(WarpkitError)
  })

  it('exposes the continuous extent corners', () => {
    const corners = Bounds.fromSize([2, 3]).corners()
    expect(corners).toEqual([[-0.5, -0.5], [-0.5, 2.5], [1.5, -0.5], [1.5, 2.5]])
  })

  it('midpoint, translate and equality', () => {
    const b = new Bounds([[2, 5], [10, 19]])
    expect(b.midpoint()).toEqual([3.5, 14.5])
    expect(b.translate([-2, -10]).equals(Bounds.fromSize([4, 10]))).toBe(true)
    expect(b.toString()).toBe('Bounds(2:5, 10:19)')
  })
})

describe('transformBounds', () => {
  it('is a no-op under the identity map', () => {
    const b = new Bounds([[3, 12], [-4, 7]])
    expect(transformBounds(b, GeometricMap.identity(2)).equals(b)).toBe(true)
  })

  it('encloses a downscaled extent', () => {
    // [-0.5, 99.5] * 0.5 = [-0.25, 49.75] → indices 0..50
    const out = transformBounds(Bounds.fromSize([100]), GeometricMap.scaling([0.5]))
    expect(out.ranges).toEqual([[0, 50]])
  })

  it('shifts by integer translations exactly', () => {
    const out = transformBounds(Bounds.fromSize([4, 5]), GeometricMap.translation([2, -3]))
    expect(out.ranges).toEqual([[2, 5], [-3, 1]])
  })

  it('absorbs floating drift from full rotations', () => {
    const b = Bounds.fromSize([10, 20])
    const full = GeometricMap.rotation2d(2 * Math.PI).recenter(b.midpoint())
    expect(transformBounds(b, full).equals(b)).toBe(true)
  })

  it('swaps extents under a quarter rotation about the midpoint', () => {
    const b = Bounds.fromSize([10, 20])
    const quarter = GeometricMap.rotation2d(Math.PI / 2).recenter(b.midpoint())
    expect(transformBounds(b, quarter).ranges).toEqual([[-5, 14], [5, 14]])
  })

  it('rejects maps of another dimension', () => {
    expect(() => transformBounds(Bounds.fromSize([4, 4]), GeometricMap.identity(3))).toThrow(DimensionMismatchError)
  })
})

describe('offsetCropBounds', () => {
  const b = Bounds.fromSize([10, 10])

  it('centres a smaller window', () => {
    expect(offsetCropBounds([4, 6], b, [0.5, 0.5]).ranges).toEqual([[3, 6], [2, 7]])
  })

  it('aligns with the lower and upper edges', () => {
    expect(offsetCropBounds([4, 6], b, [0, 1]).ranges).toEqual([[0, 3], [4, 9]])
  })

  it('returns the same bounds when the size already matches', () => {
    expect(offsetCropBounds([10, 10], b, [0.3, 0.9])).toBe(b)
  })

  it('extends past the data for larger windows', () => {
    expect(offsetCropBounds([6], Bounds.fromSize([3]), [0.5]).ranges).toEqual([[-2, 3]])
  })

  it('fails on degenerate sizes before building anything', () => {
    expect(() => offsetCropBounds([0, 4], b, [0.5, 0.5])).toThrow(DegenerateSizeError)
    expect(() => offsetCropBounds([4, -1], b, [0.5, 0.5])).toThrow(DegenerateSizeError)
  })

  it('rejects mismatched dimensions', () => {
    expect(() => offsetCropBounds([4], b, [0.5])).toThrow(DimensionMismatchError)
  })
})
