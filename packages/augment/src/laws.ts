/**
 * Law checkers for maps and transform composition.
 *
 *   1. Associativity: compose(compose(a, b), c) ≡ compose(a, compose(b, c))
 *   2. Identity:      compose(IDENTITY, t) ≡ t ≡ compose(t, IDENTITY)
 *   3. Involution:    t ∘ t ≡ id, for reflections
 *
 * Designed for use with fast-check property-based tests.
 */

import { type Bounds, GeometricMap, type Point } from '@warpkit/geometry'
import { compose } from './compose'
import { project } from './projection'
import { createRng } from './random'
import { getRandomState } from './random-state'
import { IDENTITY, type Transform, describe, isProjectiveNode } from './transform'

// ─── Map laws ───────────────────────────────────────────────────────────────

/** (f then g) then h ≡ f then (g then h), on the matrices and on `points`. */
export function checkMapAssociativity(
  f: GeometricMap,
  g: GeometricMap,
  h: GeometricMap,
  points: readonly Point[] = [],
  tol = 1e-9,
): boolean {
  const lhs = f.then(g).then(h)
  const rhs = f.then(g.then(h))
  if (!lhs.approxEquals(rhs, tol)) return false
  return points.every((p) => {
    const a = lhs.apply(p)
    const b = rhs.apply(p)
    return a.every((v, i) => Math.abs(v - b[i]) <= tol * Math.max(1, Math.abs(v)))
  })
}

// ─── Composition laws ───────────────────────────────────────────────────────

function projectionsAgree(x: Transform, y: Transform, bounds: Bounds, seed: number, tol: number): boolean {
  if (!isProjectiveNode(x) || !isProjectiveNode(y)) return describe(x) === describe(y)
  // Equal seeds give equal draws: both trees list their leaves in the same order.
  const px = project(x, bounds, getRandomState(x, createRng(seed)))
  const py = project(y, bounds, getRandomState(y, createRng(seed)))
  return px.bounds.equals(py.bounds) && px.map.approxEquals(py.map, tol)
}

/**
 * Both groupings of a three-transform chain give the same map and bounds
 * on `bounds`.
 */
export function checkComposeAssociativity(
  a: Transform,
  b: Transform,
  c: Transform,
  bounds: Bounds,
  seed = 0,
  tol = 1e-6,
): boolean {
  return projectionsAgree(compose(compose(a, b), c), compose(a, compose(b, c)), bounds, seed, tol)
}

export function checkLeftIdentity(t: Transform): boolean {
  return compose(IDENTITY, t) === t
}

export function checkRightIdentity(t: Transform): boolean {
  return compose(t, IDENTITY) === t
}

/**
 * Applying `t` twice returns to the starting map and bounds. Only
 * meaningful for deterministic transforms such as reflections.
 */
export function checkInvolution(t: Transform, bounds: Bounds, seed = 0, tol = 1e-9): boolean {
  if (!isProjectiveNode(t)) return false
  const state = getRandomState(t, createRng(seed))
  const once = project(t, bounds, state)
  const twice = project(t, once.bounds, state)
  return twice.bounds.equals(bounds) &&
    once.map.then(twice.map).approxEquals(GeometricMap.identity(bounds.dims), tol)
}
