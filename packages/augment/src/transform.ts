/**
 * Transform AST.
 *
 * Leaves are projective transforms: each one turns input bounds and a
 * random state into a GeometricMap and the bounds of the result. Composite
 * nodes are plain tagged objects produced by `compose`; they never hold
 * state of their own.
 *
 *   Identity                 no-op
 *   Composed(parts)          pure leaves folded into one map
 *   Cropped(pre, crop)       pure prefix followed by one crop window
 *   Sequence(steps)          evaluation barrier between steps
 *   OneOf(options, weights)  one option drawn per call
 *   Maybe(transform, p)      applied with probability p
 *   MapData(fn)              per-sample value function, geometry untouched
 */

import { type Bounds, type GeometricMap, transformBounds } from '@warpkit/geometry'
import type { Rng } from './random'

/**
 * How a leaf behaves under composition:
 *   fold     merges into neighbouring maps
 *   crop     closes a chain; anything after it starts a new step
 *   barrier  always starts a new step when composed after something
 */
export type CompositionTrait = 'fold' | 'crop' | 'barrier'

export interface ProjectiveTransform<S = unknown> {
  readonly kind: 'projective'
  readonly name: string
  readonly trait: CompositionTrait
  /** Draw the parameters for one call. */
  getRandomState(rng: Rng): S
  /** Narrow an externally supplied state, throwing RandomStateError when malformed. */
  checkState(state: unknown): S
  getProjection(bounds: Bounds, state: S): GeometricMap
  projectionBounds(map: GeometricMap, bounds: Bounds, state: S): Bounds
}

export interface Identity {
  readonly kind: 'identity'
}

export interface Composed {
  readonly kind: 'composed'
  readonly parts: readonly ProjectiveTransform[]
}

export interface Cropped {
  readonly kind: 'cropped'
  readonly pre: ProjectiveTransform | Composed | null
  readonly crop: ProjectiveTransform
}

export interface Sequence {
  readonly kind: 'sequence'
  readonly steps: readonly Transform[]
}

export interface OneOf {
  readonly kind: 'one-of'
  readonly options: readonly Transform[]
  readonly weights: readonly number[]
}

export interface Maybe {
  readonly kind: 'maybe'
  readonly transform: Transform
  readonly p: number
}

/** Applies `fn` to every sample of image and array items. */
export interface MapData {
  readonly kind: 'map-data'
  readonly name: string
  readonly fn: (value: number) => number
}

export type ProjectiveNode = ProjectiveTransform | Composed | Cropped
export type Transform = ProjectiveNode | Identity | Sequence | OneOf | Maybe | MapData
export type TransformKind = Transform['kind']

// ─── Leaf base ──────────────────────────────────────────────────────────────

/** Base for leaf transforms; bounds default to the enclosing image. */
export abstract class ProjectiveLeaf<S> implements ProjectiveTransform<S> {
  readonly kind = 'projective' as const
  abstract readonly name: string
  readonly trait: CompositionTrait = 'fold'

  abstract getRandomState(rng: Rng): S
  abstract checkState(state: unknown): S
  abstract getProjection(bounds: Bounds, state: S): GeometricMap

  projectionBounds(map: GeometricMap, bounds: Bounds, _state: S): Bounds {
    return transformBounds(bounds, map)
  }

  toString(): string {
    return this.name
  }
}

// ─── Guards ─────────────────────────────────────────────────────────────────

export const IDENTITY: Identity = { kind: 'identity' }

export function isProjectiveNode(t: Transform): t is ProjectiveNode {
  return t.kind === 'projective' || t.kind === 'composed' || t.kind === 'cropped'
}

/** Leaves and chains that fold into a single map. */
export function isPure(t: Transform): t is ProjectiveTransform | Composed {
  return t.kind === 'composed' || (t.kind === 'projective' && t.trait !== 'crop')
}

export function isCropLike(t: Transform): boolean {
  return t.kind === 'cropped' || (t.kind === 'projective' && t.trait === 'crop')
}

/** Short human-readable form, used in logs and error messages. */
export function describe(t: Transform): string {
  switch (t.kind) {
    case 'projective':
      return t.name
    case 'identity':
      return 'Identity'
    case 'composed':
      return `Composed(${t.parts.map(describe).join(', ')})`
    case 'cropped':
      return `Cropped(${t.pre === null ? '' : describe(t.pre) + ', '}${describe(t.crop)})`
    case 'sequence':
      return `Sequence(${t.steps.map(describe).join(' |> ')})`
    case 'one-of':
      return `OneOf(${t.options.map(describe).join(', ')})`
    case 'maybe':
      return `Maybe(${describe(t.transform)}, p=${t.p})`
    case 'map-data':
      return `Map(${t.name})`
  }
}
