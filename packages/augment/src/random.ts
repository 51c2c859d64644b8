/**
 * Random sources and distributions for transform parameters.
 *
 * Randomness is always passed explicitly as an `Rng`; the engine draws
 * from it once per top-level apply call.
 */

import { settings } from '@warpkit/config'
import type { DistributionSpec } from '@warpkit/shared'
import { WarpkitError } from './errors'

/** Uniform source on [0, 1). */
export type Rng = () => number

export type Distribution = DistributionSpec

/** Seedable PRNG (mulberry32). */
export function createRng(seed: number): Rng {
  let s = seed | 0
  return () => {
    s = (s + 0x6d2b79f5) | 0
    let t = Math.imul(s ^ (s >>> 15), 1 | s)
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

let processRng: Rng | null = null

/**
 * Process-wide source used when a caller supplies none. Seeded from
 * `WARPKIT_SEED` when set.
 */
export function defaultRng(): Rng {
  if (processRng === null) {
    const seed = settings().seed
    processRng = seed === undefined ? Math.random : createRng(seed)
  }
  return processRng
}

export function resetDefaultRng(): void {
  processRng = null
}

// ─── Distributions ──────────────────────────────────────────────────────────

export function uniform(min: number, max: number): Distribution {
  if (!(min <= max)) throw new WarpkitError(`uniform: min ${min} exceeds max ${max}`)
  return { kind: 'uniform', min, max }
}

export function constant(value: number): Distribution {
  return { kind: 'constant', value }
}

export function choice(values: readonly number[]): Distribution {
  if (values.length === 0) throw new WarpkitError('choice: no values to choose from')
  return { kind: 'choice', values: [...values] }
}

export function normal(mean: number, std: number): Distribution {
  if (std < 0) throw new WarpkitError(`normal: negative standard deviation ${std}`)
  return { kind: 'normal', mean, std }
}

/** Box-Muller transform: one sample from N(mean, std^2). */
export function normalSample(rng: Rng, mean: number, std: number): number {
  let u1 = rng()
  // Guard against log(0)
  while (u1 === 0) u1 = rng()
  const u2 = rng()
  return mean + std * Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
}

/** Draw one value. Constant distributions do not consume the source. */
export function sample(dist: Distribution, rng: Rng): number {
  switch (dist.kind) {
    case 'uniform':
      return dist.min + (dist.max - dist.min) * rng()
    case 'constant':
      return dist.value
    case 'choice':
      return dist.values[Math.min(dist.values.length - 1, Math.floor(rng() * dist.values.length))]
    case 'normal':
      return normalSample(rng, dist.mean, dist.std)
  }
}

/** Index drawn with probability proportional to `weights`. */
export function weightedIndex(weights: readonly number[], rng: Rng): number {
  const total = weights.reduce((a, b) => a + b, 0)
  if (!(total > 0)) throw new WarpkitError('weightedIndex: weights must sum to a positive value')
  let r = rng() * total
  for (let i = 0; i < weights.length; i++) {
    r -= weights[i]
    if (r < 0) return i
  }
  return weights.length - 1
}
