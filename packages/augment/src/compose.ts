/**
 * Composition of transforms, applied left to right.
 *
 * Rewrite rules for compose(a, b), checked in order:
 *   1. Identity on either side is dropped.
 *   2. Sequences splice: the touching ends are composed and spliced in.
 *   3. OneOf / Maybe / MapData on either side -> Sequence(a, b).
 *   4. b starts with a barrier (PinOrigin) -> Sequence(a, b).
 *   5. a is a crop or Cropped -> Sequence(a, b); nothing folds past a crop.
 *   6. b is a crop leaf -> Cropped(a, b).
 *   7. b is Cropped(pre, c) -> Cropped(compose(a, pre), c).
 *   8. pure + pure -> Composed, flattened.
 *
 * Chains with at most one crop are associative; every further crop starts
 * a new Sequence step.
 */

import { WarpkitError } from './errors'
import { engineLogger } from './log'
import {
  type Composed,
  type Cropped,
  IDENTITY,
  type MapData,
  type Maybe,
  type OneOf,
  type ProjectiveTransform,
  type Transform,
  describe,
  isCropLike,
  isPure,
} from './transform'

// ─── Constructors ───────────────────────────────────────────────────────────

export function sequence(steps: readonly Transform[]): Transform {
  const flat = steps.flatMap<Transform>((s) => (s.kind === 'sequence' ? s.steps : s.kind === 'identity' ? [] : [s]))
  if (flat.length === 0) return IDENTITY
  if (flat.length === 1) return flat[0]
  return { kind: 'sequence', steps: flat }
}

export function oneOf(options: readonly Transform[], weights?: readonly number[]): OneOf {
  if (options.length === 0) throw new WarpkitError('oneOf: at least one option is required')
  const w = weights ?? options.map(() => 1)
  if (w.length !== options.length) {
    throw new WarpkitError(`oneOf: ${w.length} weights for ${options.length} options`)
  }
  if (w.some((x) => !(x >= 0)) || !(w.reduce((a, b) => a + b, 0) > 0)) {
    throw new WarpkitError('oneOf: weights must be non-negative with a positive sum')
  }
  return { kind: 'one-of', options: [...options], weights: [...w] }
}

export function maybe(transform: Transform, p = 0.5): Maybe {
  if (!(p >= 0 && p <= 1)) throw new WarpkitError(`maybe: probability ${p} is outside [0, 1]`)
  return { kind: 'maybe', transform, p }
}

/** Value transform on image and array samples; other items pass through. */
export function mapData(fn: (value: number) => number, name = fn.name || 'fn'): MapData {
  return { kind: 'map-data', name, fn }
}

function composed(a: ProjectiveTransform | Composed, b: ProjectiveTransform | Composed): Composed {
  const parts = (t: ProjectiveTransform | Composed): readonly ProjectiveTransform[] =>
    t.kind === 'composed' ? t.parts : [t]
  return { kind: 'composed', parts: [...parts(a), ...parts(b)] }
}

function cropped(pre: ProjectiveTransform | Composed | null, crop: ProjectiveTransform): Cropped {
  return { kind: 'cropped', pre, crop }
}

function stepsOf(t: Transform): readonly Transform[] {
  if (t.kind === 'identity') return []
  return t.kind === 'sequence' ? t.steps : [t]
}

function startsWithBarrier(t: Transform): boolean {
  switch (t.kind) {
    case 'projective':
      return t.trait === 'barrier'
    case 'composed':
      return t.parts[0].trait === 'barrier'
    case 'cropped':
      return t.pre !== null && startsWithBarrier(t.pre)
    default:
      return false
  }
}

// ─── compose ────────────────────────────────────────────────────────────────

function rewrite(rule: string, a: Transform, b: Transform, result: Transform): Transform {
  const log = engineLogger()
  if (log.isEnabled('debug')) {
    log.debug('compose', { rule, left: describe(a), right: describe(b), result: describe(result) })
  }
  return result
}

function composePair(a: Transform, b: Transform): Transform {
  if (a.kind === 'identity') return b
  if (b.kind === 'identity') return a

  if (a.kind === 'sequence' || b.kind === 'sequence') {
    const left = stepsOf(a)
    const right = stepsOf(b)
    const middle = composePair(left[left.length - 1], right[0])
    return rewrite('splice', a, b, sequence([...left.slice(0, -1), ...stepsOf(middle), ...right.slice(1)]))
  }

  if (a.kind === 'one-of' || a.kind === 'maybe' || b.kind === 'one-of' || b.kind === 'maybe') {
    return rewrite('random-choice', a, b, { kind: 'sequence', steps: [a, b] })
  }
  if (a.kind === 'map-data' || b.kind === 'map-data') {
    return rewrite('map-data', a, b, { kind: 'sequence', steps: [a, b] })
  }
  if (startsWithBarrier(b)) {
    return rewrite('barrier', a, b, { kind: 'sequence', steps: [a, b] })
  }
  if (isCropLike(a)) {
    return rewrite('after-crop', a, b, { kind: 'sequence', steps: [a, b] })
  }
  if (!isPure(a)) {
    throw new WarpkitError(`compose: cannot fold ${describe(a)}`)
  }
  if (b.kind === 'projective' && b.trait === 'crop') {
    return rewrite('crop', a, b, cropped(a, b))
  }
  if (b.kind === 'cropped') {
    const pre = b.pre === null ? a : composePair(a, b.pre)
    if (!isPure(pre)) throw new WarpkitError(`compose: cannot fold ${describe(pre)}`)
    return rewrite('into-crop', a, b, cropped(pre, b.crop))
  }
  if (!isPure(b)) {
    throw new WarpkitError(`compose: cannot fold ${describe(b)}`)
  }
  return rewrite('fold', a, b, composed(a, b))
}

/** Compose transforms in application order: `a` runs first. */
export function compose(a: Transform, ...rest: Transform[]): Transform {
  return rest.reduce<Transform>(composePair, a)
}

// ─── Fluent builder ─────────────────────────────────────────────────────────

export interface Pipeline {
  readonly transform: Transform
  /** Append `next` after everything composed so far. */
  then(next: Transform): Pipeline
}

/** Fluent composition: `pipeline(a).then(b).then(c).transform`. */
export function pipeline(first: Transform = IDENTITY): Pipeline {
  return {
    transform: first,
    then: (next) => pipeline(compose(first, next)),
  }
}
