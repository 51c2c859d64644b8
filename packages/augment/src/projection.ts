/**
 * Projection of the projective node types: one GeometricMap and the
 * resulting bounds. Bounds are tracked part by part, so each leaf sees the
 * output bounds of the one before it.
 */

import { type Bounds, GeometricMap } from '@warpkit/geometry'
import { stateTuple } from './random-state'
import type { Composed, ProjectiveNode, ProjectiveTransform } from './transform'

export interface Projection {
  readonly map: GeometricMap
  readonly bounds: Bounds
}

function projectLeaf(t: ProjectiveTransform, bounds: Bounds, state: unknown): Projection {
  const s = t.checkState(state)
  const map = t.getProjection(bounds, s)
  return { map, bounds: t.projectionBounds(map, bounds, s) }
}

function projectComposed(t: Composed, bounds: Bounds, state: unknown): Projection {
  const states = stateTuple(state, t.parts.length, 'Composed')
  let map = GeometricMap.identity(bounds.dims)
  let current = bounds
  t.parts.forEach((part, i) => {
    const step = projectLeaf(part, current, states[i])
    map = map.then(step.map)
    current = step.bounds
  })
  return { map, bounds: current }
}

export function project(t: ProjectiveNode, bounds: Bounds, state: unknown): Projection {
  switch (t.kind) {
    case 'projective':
      return projectLeaf(t, bounds, state)
    case 'composed':
      return projectComposed(t, bounds, state)
    case 'cropped': {
      const [preState, cropState] = stateTuple(state, 2, 'Cropped')
      const pre = t.pre === null
        ? { map: GeometricMap.identity(bounds.dims), bounds }
        : project(t.pre, bounds, preState)
      const crop = projectLeaf(t.crop, pre.bounds, cropState)
      return { map: pre.map.then(crop.map), bounds: crop.bounds }
    }
  }
}

/** The map alone. */
export function getProjection(t: ProjectiveNode, bounds: Bounds, state: unknown): GeometricMap {
  return project(t, bounds, state).map
}

/** The output bounds alone. */
export function projectionBounds(t: ProjectiveNode, bounds: Bounds, state: unknown): Bounds {
  return project(t, bounds, state).bounds
}
