/**
 * Random states: drawing them for a whole transform tree, and narrowing
 * caller-supplied states back to the shape each node expects.
 *
 *   leaf               number | number[] | null (leaf-defined)
 *   Composed/Sequence  tuple of child states
 *   Cropped            [pre state, crop state]
 *   OneOf              { index, inner }
 *   Maybe              { applied, inner }
 *   MapData            null
 */

import { RandomStateError } from './errors'
import { type Rng, weightedIndex } from './random'
import type { Transform } from './transform'

export type RandomState = unknown

export interface ChoiceState {
  readonly index: number
  readonly inner: RandomState
}

export interface MaybeState {
  readonly applied: boolean
  readonly inner: RandomState
}

/** Draw the state for `t` and all of its children. */
export function getRandomState(t: Transform, rng: Rng): RandomState {
  switch (t.kind) {
    case 'identity':
      return null
    case 'projective':
      return t.getRandomState(rng)
    case 'composed':
      return t.parts.map((p) => p.getRandomState(rng))
    case 'cropped':
      return [t.pre === null ? null : getRandomState(t.pre, rng), t.crop.getRandomState(rng)]
    case 'sequence':
      return t.steps.map((s) => getRandomState(s, rng))
    case 'one-of': {
      const index = weightedIndex(t.weights, rng)
      return { index, inner: getRandomState(t.options[index], rng) }
    }
    case 'maybe': {
      const applied = rng() < t.p
      return { applied, inner: applied ? getRandomState(t.transform, rng) : null }
    }
    case 'map-data':
      return null
  }
}

// ─── Narrowing ──────────────────────────────────────────────────────────────

export function stateTuple(state: RandomState, length: number, context: string): readonly unknown[] {
  if (!Array.isArray(state) || state.length !== length) {
    throw new RandomStateError(context, `a tuple of ${length} states`)
  }
  return state
}

export function nullState(state: RandomState, context: string): null {
  if (state !== null) throw new RandomStateError(context, 'null')
  return null
}

export function numberState(state: RandomState, context: string): number {
  if (typeof state !== 'number' || !Number.isFinite(state)) {
    throw new RandomStateError(context, 'a finite number')
  }
  return state
}

export function numberTupleState(state: RandomState, length: number, context: string): number[] {
  const tuple = stateTuple(state, length, context)
  const out: number[] = []
  for (const v of tuple) {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      throw new RandomStateError(context, `${length} finite numbers`)
    }
    out.push(v)
  }
  return out
}

export function choiceState(state: RandomState, optionCount: number, context: string): ChoiceState {
  if (typeof state === 'object' && state !== null && 'index' in state && 'inner' in state) {
    const { index, inner } = state
    if (typeof index === 'number' && Number.isInteger(index) && index >= 0 && index < optionCount) {
      return { index, inner }
    }
  }
  throw new RandomStateError(context, `{ index < ${optionCount}, inner }`)
}

export function maybeState(state: RandomState, context: string): MaybeState {
  if (typeof state === 'object' && state !== null && 'applied' in state && 'inner' in state) {
    const { applied, inner } = state
    if (typeof applied === 'boolean') return { applied, inner }
  }
  throw new RandomStateError(context, '{ applied, inner }')
}
