/**
 * Planar rotations and reflections about the centre of the bounds.
 * Angles are in degrees, counter-clockwise in the (axis 0, axis 1) plane.
 */

import { type Bounds, DimensionMismatchError, GeometricMap, roundMatrix } from '@warpkit/geometry'
import { type Distribution, type Rng, constant, sample, uniform } from '../random'
import { nullState, numberState } from '../random-state'
import { ProjectiveLeaf } from '../transform'

const DEG = Math.PI / 180

function assertPlanar(bounds: Bounds, context: string): void {
  if (bounds.dims !== 2) throw new DimensionMismatchError(2, bounds.dims, context)
}

function describeDistribution(dist: Distribution): string {
  switch (dist.kind) {
    case 'uniform':
      return `${dist.min}..${dist.max}`
    case 'constant':
      return String(dist.value)
    case 'choice':
      return `{${dist.values.join(', ')}}`
    case 'normal':
      return `N(${dist.mean}, ${dist.std})`
  }
}

/**
 * Random rotation. A number `g` draws the angle uniformly from [-|g|, |g|];
 * a distribution is sampled as given.
 */
export class Rotate extends ProjectiveLeaf<number> {
  readonly name: string
  readonly angle: Distribution

  constructor(angle: number | Distribution) {
    super()
    this.angle = typeof angle === 'number' ? uniform(-Math.abs(angle), Math.abs(angle)) : angle
    this.name = `Rotate(${describeDistribution(this.angle)})`
  }

  getRandomState(rng: Rng): number {
    return sample(this.angle, rng)
  }

  checkState(state: unknown): number {
    return numberState(state, this.name)
  }

  getProjection(bounds: Bounds, degrees: number): GeometricMap {
    assertPlanar(bounds, this.name)
    return GeometricMap.rotation2d(degrees * DEG).recenter(bounds.midpoint())
  }
}

/** Quarter turn counter-clockwise. */
export function rotate90(): Rotate {
  return new Rotate(constant(90))
}

export function rotate180(): Rotate {
  return new Rotate(constant(180))
}

export function rotate270(): Rotate {
  return new Rotate(constant(270))
}

/** Reflection across the line through the centre at `degrees` from axis 0. */
export class Reflect extends ProjectiveLeaf<null> {
  readonly name: string

  constructor(readonly degrees: number) {
    super()
    this.name = `Reflect(${degrees})`
  }

  getRandomState(): null {
    return null
  }

  checkState(state: unknown): null {
    return nullState(state, this.name)
  }

  getProjection(bounds: Bounds): GeometricMap {
    assertPlanar(bounds, this.name)
    const r = 2 * this.degrees * DEG
    const a = roundMatrix([
      [Math.cos(r), Math.sin(r)],
      [Math.sin(r), -Math.cos(r)],
    ], 12)
    return GeometricMap.linear(a).recenter(bounds.midpoint())
  }
}

/** Mirror along axis 1 (left-right for images). */
export function flipX(): Reflect {
  return new Reflect(180)
}

/** Mirror along axis 0 (top-bottom for images). */
export function flipY(): Reflect {
  return new Reflect(90)
}
