import { describe, test, expect } from 'vitest'
import { Bounds } from '@warpkit/geometry'
import {
  CropIndices,
  DegenerateSizeError,
  DimensionMismatchError,
  PinOrigin,
  RandomStateError,
  Rotate,
  ScaleFixed,
  ScaleKeepAspect,
  ScaleRatio,
  Translate,
  WarpkitError,
  Zoom,
  centerCrop,
  centerResizeCrop,
  checkInvolution,
  compose,
  cropDivisible,
  cropRatio,
  flipX,
  flipY,
  padDivisible,
  project,
  randomCrop,
  resizeFixed,
  resizeRatio,
  rotate180,
  rotate270,
  rotate90,
} from '../index'

function expectPointClose(actual: readonly number[], expected: readonly number[]): void {
  expect(actual.length).toBe(expected.length)
  actual.forEach((v, i) => expect(v).toBeCloseTo(expected[i], 9))
}

// ─── Scaling ────────────────────────────────────────────────────────────────

describe('ScaleFixed', () => {
  test('is a no-op when the lengths already match', () => {
    const bounds = new Bounds([[5, 14], [3, 22]])
    const p = project(new ScaleFixed([10, 20]), bounds, null)
    expect(p.map.isIdentity()).toBe(true)
    expect(p.bounds).toBe(bounds)
  })

  test('resizes to exact zero-based bounds', () => {
    const p = project(new ScaleFixed([20, 20]), Bounds.fromSize([10, 10]), null)
    expect(p.bounds.ranges).toEqual([[0, 19], [0, 19]])
    expect(p.map.apply([0, 0])).toEqual([0.5, 0.5])
    expect(p.map.apply([9, 9])).toEqual([18.5, 18.5])
  })

  test('starts at zero for offset input bounds', () => {
    const p = project(new ScaleFixed([20]), new Bounds([[5, 14]]), null)
    expect(p.bounds.ranges).toEqual([[0, 19]])
    expect(p.map.apply([5])).toEqual([0.5])
  })

  test('rejects degenerate sizes before building a map', () => {
    expect(() => new ScaleFixed([0, 10])).toThrow(DegenerateSizeError)
    expect(() => new ScaleFixed([2.5])).toThrow(DegenerateSizeError)
    expect(() => new ScaleRatio([1, -1])).toThrow(DegenerateSizeError)
  })

  test('rejects bounds of another dimensionality', () => {
    expect(() => project(new ScaleFixed([4, 4]), Bounds.fromSize([4, 4, 4]), null)).toThrow(DimensionMismatchError)
  })
})

describe('ScaleRatio', () => {
  test('scales about the origin', () => {
    const p = project(new ScaleRatio([0.5]), Bounds.fromSize([100]), null)
    expect(p.bounds.ranges).toEqual([[0, 50]])
    expect(p.map.apply([10])).toEqual([5])
  })
})

describe('ScaleKeepAspect', () => {
  test('scales 100x400 so the shorter side reaches 200', () => {
    const p = project(new ScaleKeepAspect([200, 200]), Bounds.fromSize([100, 400]), null)
    expect(p.bounds.ranges).toEqual([[0, 199], [0, 799]])
  })

  test('is a no-op when the lengths already match', () => {
    const bounds = Bounds.fromSize([100, 400])
    const p = project(new ScaleKeepAspect([100, 400]), bounds, null)
    expect(p.map.isIdentity()).toBe(true)
    expect(p.bounds).toBe(bounds)
  })
})

// ─── Rotation and reflection ────────────────────────────────────────────────

describe('Rotate', () => {
  test('draws the angle uniformly from [-g, g]', () => {
    const rotate = new Rotate(15)
    expect(rotate.getRandomState(() => 0)).toBe(-15)
    expect(rotate.getRandomState(() => 0.5)).toBe(0)
  })

  test('a quarter turn encloses the rotated extent', () => {
    const p = project(rotate90(), Bounds.fromSize([10, 20]), 90)
    expect(p.bounds.ranges).toEqual([[-5, 14], [5, 14]])
    expectPointClose(p.map.apply([0, 0]), [14, 5])
  })

  test('half and three-quarter turns keep the centre fixed', () => {
    const bounds = Bounds.fromSize([10, 20])
    const half = project(rotate180(), bounds, 180)
    expect(half.bounds.ranges).toEqual([[0, 9], [0, 19]])
    expectPointClose(half.map.apply([0, 0]), [9, 19])
    const threeQuarter = project(rotate270(), bounds, 270)
    expect(threeQuarter.bounds.ranges).toEqual([[-5, 14], [5, 14]])
    expectPointClose(threeQuarter.map.apply([0, 0]), [-5, 14])
  })

  test('fixed rotations draw their constant angle', () => {
    expect(rotate90().getRandomState(() => 0.3)).toBe(90)
    expect(rotate180().name).toBe('Rotate(180)')
  })

  test('is planar only', () => {
    expect(() => project(new Rotate(10), Bounds.fromSize([4, 4, 4]), 5)).toThrow(DimensionMismatchError)
  })

  test('rejects malformed states', () => {
    expect(() => project(new Rotate(10), Bounds.fromSize([4, 4]), 'ten')).toThrow(RandomStateError)
  })
})

describe('Reflect', () => {
  test('flipX mirrors axis 1 and flipY mirrors axis 0', () => {
    const bounds = Bounds.fromSize([7, 12])
    expect(project(flipX(), bounds, null).map.apply([0, 0])).toEqual([0, 11])
    expect(project(flipY(), bounds, null).map.apply([0, 0])).toEqual([6, 0])
    expect(project(flipX(), bounds, null).bounds.equals(bounds)).toBe(true)
  })

  test('flips are involutions', () => {
    expect(checkInvolution(flipX(), Bounds.fromSize([7, 12]))).toBe(true)
    expect(checkInvolution(flipY(), new Bounds([[2, 9], [-4, 5]]))).toBe(true)
  })
})

// ─── Zoom, translation, pinning ─────────────────────────────────────────────

describe('Zoom', () => {
  test('scales about the centre and encloses the result', () => {
    const p = project(new Zoom([2, 2]), Bounds.fromSize([10, 10]), 2)
    expect(p.bounds.ranges).toEqual([[-5, 14], [-5, 14]])
    expect(p.map.apply([4.5, 4.5])).toEqual([4.5, 4.5])
  })
})

describe('Translate', () => {
  test('fixed shifts are kept and ranges are drawn', () => {
    expect(new Translate([3, [0, 10]]).getRandomState(() => 0.25)).toEqual([3, 2.5])
  })

  test('moves the bounds by integer shifts', () => {
    const p = project(new Translate([3, -2]), Bounds.fromSize([4, 4]), [3, -2])
    expect(p.bounds.ranges).toEqual([[3, 6], [-2, 1]])
  })
})

describe('PinOrigin', () => {
  test('yields a zero-based minimum corner', () => {
    const p = project(new PinOrigin(), new Bounds([[5, 14], [-3, 6]]), null)
    expect(p.bounds.mins()).toEqual([0, 0])
    expect(p.bounds.lengths()).toEqual([10, 10])
    expect(p.map.apply([5, -3])).toEqual([0, 0])
  })

  test('bounds are tracked part by part in a composed chain', () => {
    const chain = compose(new PinOrigin(), new ScaleRatio([2, 2]))
    expect(chain.kind).toBe('composed')
    const p = project(new PinOrigin(), new Bounds([[5, 9], [5, 9]]), null)
    expect(p.bounds.ranges).toEqual([[0, 4], [0, 4]])
    if (chain.kind !== 'composed') return
    const q = project(chain, new Bounds([[5, 9], [5, 9]]), [null, null])
    expect(q.bounds.ranges).toEqual([[-1, 9], [-1, 9]])
    expect(q.map.apply([9, 9])).toEqual([8, 8])
  })
})

// ─── Crops ──────────────────────────────────────────────────────────────────

describe('Crop', () => {
  const b10 = Bounds.fromSize([10, 10])

  test('center crop takes the middle window', () => {
    expect(project(centerCrop([4, 6]), b10, null).bounds.ranges).toEqual([[3, 6], [2, 7]])
  })

  test('ratio crop rounds the window size', () => {
    expect(project(cropRatio([0.5, 0.5]), Bounds.fromSize([10, 20]), null).bounds.ranges).toEqual([[2, 6], [5, 14]])
  })

  test('divisible crops round down, padding rounds up', () => {
    const bounds = Bounds.fromSize([10, 13])
    expect(project(cropDivisible(4), bounds, null).bounds.ranges).toEqual([[1, 8], [0, 11]])
    expect(project(padDivisible(4), bounds, null).bounds.ranges).toEqual([[0, 11], [0, 15]])
  })

  test('random crop reaches both ends of the slack', () => {
    expect(project(randomCrop([4, 4]), b10, [0, 0.999]).bounds.ranges).toEqual([[0, 3], [6, 9]])
    expect(randomCrop([4, 4]).getRandomState(() => 0.3)).toEqual([0.3, 0.3])
  })

  test('random crop states must match the crop dimensionality', () => {
    expect(() => project(randomCrop([4, 4]), b10, [0.5])).toThrow(RandomStateError)
    expect(() => project(centerCrop([4, 4]), Bounds.fromSize([10, 10, 10]), null)).toThrow(DimensionMismatchError)
  })

  test('windows that round to nothing are rejected', () => {
    expect(() => centerCrop([3, -1])).toThrow(DegenerateSizeError)
    expect(() => project(cropRatio([0.01, 0.01]), b10, null)).toThrow(DegenerateSizeError)
  })

  test('an empty window is rejected before its map is built', () => {
    expect(() => cropRatio([0.01, 0.01]).getProjection(b10)).toThrow(DegenerateSizeError)
    expect(() => cropDivisible(16).getProjection(b10)).toThrow(DegenerateSizeError)
  })

  test('index crops need integer ranges', () => {
    expect(() => new CropIndices([[0.5, 3], [0, 1]])).toThrow(WarpkitError)
  })

  test('index crops return their ranges', () => {
    expect(project(new CropIndices([[2, 5], [0, 3]]), b10, null).bounds.ranges).toEqual([[2, 5], [0, 3]])
  })

  test('the map of a crop is the identity', () => {
    expect(project(centerCrop([4, 4]), b10, null).map.isIdentity()).toBe(true)
  })
})

describe('resize presets', () => {
  test('resizeFixed scales to the size and pins the origin', () => {
    const t = resizeFixed([5, 5])
    expect(t.kind).toBe('sequence')
    if (t.kind !== 'sequence') return
    const [scale, pin] = t.steps
    if (scale.kind !== 'projective' || pin.kind !== 'projective') return
    const scaled = project(scale, new Bounds([[5, 14], [3, 12]]), null)
    expect(scaled.bounds.ranges).toEqual([[0, 4], [0, 4]])
    expectPointClose(scaled.map.apply([9, 12]), [1.75, 4.25])
    expect(project(pin, scaled.bounds, null).map.isIdentity()).toBe(true)
  })

  test('resizeRatio scales about the origin and pins the result', () => {
    const t = resizeRatio([0.5, 0.5])
    expect(t.kind).toBe('sequence')
    if (t.kind !== 'sequence') return
    const [scale, pin] = t.steps
    if (scale.kind !== 'projective' || pin.kind !== 'projective') return
    const scaled = project(scale, Bounds.fromSize([10, 10]), null)
    expect(scaled.bounds.ranges).toEqual([[0, 5], [0, 5]])
    expect(project(pin, scaled.bounds, null).bounds.ranges).toEqual([[0, 5], [0, 5]])
  })
})

describe('centerResizeCrop', () => {
  test('crops 64x64 from the centre of the scaled intermediate', () => {
    const bounds = Bounds.fromSize([100, 150])
    expect(project(new ScaleKeepAspect([64, 64]), bounds, null).bounds.ranges).toEqual([[0, 63], [0, 95]])

    const t = centerResizeCrop([64, 64])
    expect(t.kind).toBe('sequence')
    if (t.kind !== 'sequence') return
    const [cropped, pin] = t.steps
    expect(cropped.kind).toBe('cropped')
    if (cropped.kind !== 'cropped' || pin.kind !== 'projective') return
    const window = project(cropped, bounds, [null, null]).bounds
    expect(window.ranges).toEqual([[0, 63], [16, 79]])
    expect(project(pin, window, null).bounds.ranges).toEqual([[0, 63], [0, 63]])
  })
})
