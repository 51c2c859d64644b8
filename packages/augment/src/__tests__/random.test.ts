import { afterEach, describe, test, expect, vi } from 'vitest'
import fc from 'fast-check'
import { resetSettings } from '@warpkit/config'
import {
  Rotate,
  choice,
  constant,
  createRng,
  defaultRng,
  getRandomState,
  maybe,
  normal,
  oneOf,
  sample,
  uniform,
  weightedIndex,
  flipX,
  compose,
  centerCrop,
  randomCrop,
  resetDefaultRng,
  WarpkitError,
} from '../index'

describe('createRng', () => {
  test('equal seeds give equal sequences in [0, 1)', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 2 ** 31 - 1 }), (seed) => {
        const a = createRng(seed)
        const b = createRng(seed)
        for (let i = 0; i < 5; i++) {
          const x = a()
          expect(x).toBe(b())
          expect(x).toBeGreaterThanOrEqual(0)
          expect(x).toBeLessThan(1)
        }
      }),
    )
  })
})

describe('defaultRng', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    resetSettings()
    resetDefaultRng()
  })

  test('is seeded from WARPKIT_SEED and kept until reset', () => {
    vi.stubEnv('WARPKIT_SEED', '42')
    resetSettings()
    resetDefaultRng()
    const rng = defaultRng()
    expect(defaultRng()).toBe(rng)
    const expected = createRng(42)
    expect([rng(), rng()]).toEqual([expected(), expected()])

    resetDefaultRng()
    expect(defaultRng()).not.toBe(rng)
    expect(defaultRng()()).toBe(createRng(42)())
  })

  test('falls back to Math.random without a seed', () => {
    vi.stubEnv('WARPKIT_SEED', '')
    resetSettings()
    resetDefaultRng()
    expect(defaultRng()).toBe(Math.random)
  })
})

describe('sample', () => {
  test('constants do not consume the source', () => {
    const rng = vi.fn(() => 0.5)
    expect(sample(constant(4), rng)).toBe(4)
    expect(rng).not.toHaveBeenCalled()
  })

  test('uniform and choice map the draw', () => {
    expect(sample(uniform(2, 6), () => 0.25)).toBe(3)
    expect(sample(choice([4, 5, 6]), () => 0.99)).toBe(6)
    expect(sample(normal(3, 0), () => 0.5)).toBe(3)
  })

  test('distribution constructors validate their parameters', () => {
    expect(() => uniform(2, 1)).toThrow(WarpkitError)
    expect(() => choice([])).toThrow(WarpkitError)
    expect(() => normal(0, -1)).toThrow(WarpkitError)
  })
})

describe('weightedIndex', () => {
  test('picks proportionally to the weights', () => {
    expect(weightedIndex([1, 1], () => 0.5)).toBe(1)
    expect(weightedIndex([3, 1], () => 0.5)).toBe(0)
    expect(weightedIndex([0, 1], () => 0)).toBe(1)
  })

  test('rejects weights without mass', () => {
    expect(() => weightedIndex([0, 0], () => 0.5)).toThrow(WarpkitError)
  })
})

describe('getRandomState', () => {
  test('leaf states follow the leaf', () => {
    expect(getRandomState(new Rotate(10), () => 0.5)).toBe(0)
    expect(getRandomState(flipX(), () => 0.5)).toBeNull()
  })

  test('composite states mirror the tree', () => {
    const t = compose(new Rotate(10), flipX(), randomCrop([4, 4]), centerCrop([2, 2]))
    expect(getRandomState(t, () => 0.5)).toEqual([[[0, null], [0.5, 0.5]], null])
  })

  test('choices record what was drawn', () => {
    expect(getRandomState(oneOf([flipX(), new Rotate(10)], [0, 1]), () => 0.5)).toEqual({ index: 1, inner: 0 })
    expect(getRandomState(maybe(new Rotate(10), 1), () => 0.5)).toEqual({ applied: true, inner: 0 })
    expect(getRandomState(maybe(new Rotate(10), 0), () => 0.5)).toEqual({ applied: false, inner: null })
  })
})
