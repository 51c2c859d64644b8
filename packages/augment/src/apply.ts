/**
 * Apply engine: draw one random state per call, then walk the transform
 * and the item together.
 *
 * Projective nodes are planned first (map and output bounds for every
 * spatial sub-item) and executed second, so an in-place call can reject a
 * mismatched buffer before anything is written.
 */

import { type Logger, settings } from '@warpkit/config'
import type { Bounds, GeometricMap } from '@warpkit/geometry'
import { checkShapes, copyItemData } from './buffers'
import { KindMismatchError, ShapeMismatchError } from './errors'
import {
  type Item,
  type PixelData,
  type PointItem,
  type RasterItem,
  type SpatialItem,
  isPointSet,
  isRaster,
  many,
  withPoints,
  withRaster,
} from './items'
import { engineLogger } from './log'
import { type Projection, project } from './projection'
import { type RandomState, choiceState, getRandomState, maybeState, nullState, stateTuple } from './random-state'
import { type Rng, defaultRng } from './random'
import {
  type Extrapolation,
  type Interpolation,
  type Resampler,
  type WarpOptions,
  allocateLike,
  defaultResampler,
  quantizer,
} from './resample'
import { type ProjectiveNode, type Transform, describe } from './transform'

export interface ApplyOptions {
  /** Random source; defaults to the process-wide source. */
  rng?: Rng
  /** Use this state instead of drawing one. */
  state?: RandomState
  resampler?: Resampler
  /** Defaults to the `interpolation` setting. Masks always use nearest. */
  interpolation?: Interpolation
  /** Defaults to a constant fill with the `fill` setting. Masks always fill 0. */
  extrapolation?: Extrapolation
  logger?: Logger
}

interface Context {
  readonly resampler: Resampler
  readonly warp: WarpOptions
}

const MASK_WARP: WarpOptions = { interpolation: 'nearest', extrapolation: { kind: 'constant', value: 0 } }

function contextFor(options: ApplyOptions): Context {
  const s = settings()
  return {
    resampler: options.resampler ?? defaultResampler,
    warp: {
      interpolation: options.interpolation ?? s.interpolation,
      extrapolation: options.extrapolation ?? { kind: 'constant', value: s.fill },
    },
  }
}

// ─── Plan ───────────────────────────────────────────────────────────────────

type Plan =
  | { readonly kind: 'keep'; readonly item: Item }
  | { readonly kind: 'spatial'; readonly item: SpatialItem; readonly projection: Projection }
  | { readonly kind: 'many'; readonly plans: readonly Plan[] }

function planItem(t: ProjectiveNode, item: Item, state: RandomState): Plan {
  if (item.kind === 'many') return { kind: 'many', plans: item.items.map((sub) => planItem(t, sub, state)) }
  if (item.kind === 'category') return { kind: 'keep', item }
  return { kind: 'spatial', item, projection: project(t, item.bounds, state) }
}

function outputLength(item: SpatialItem, bounds: Bounds): number {
  if (isRaster(item)) return bounds.lengths().reduce((a, b) => a * b, 1) * item.channels
  return item.data.length
}

function checkPlan(buffer: Item, plan: Plan, path: string): void {
  if (plan.kind === 'many') {
    if (buffer.kind !== 'many' || buffer.items.length !== plan.plans.length) {
      throw new ShapeMismatchError([plan.plans.length], [buffer.kind === 'many' ? buffer.items.length : 0], `${path} item count`)
    }
    const items = buffer.items
    plan.plans.forEach((p, i) => checkPlan(items[i], p, `${path}[${i}]`))
    return
  }
  const { item } = plan
  if (buffer.kind !== item.kind) {
    throw new KindMismatchError(item.kind, buffer.kind, path)
  }
  if (plan.kind === 'spatial' && (isRaster(buffer) || isPointSet(buffer))) {
    const expected = outputLength(plan.item, plan.projection.bounds)
    if (buffer.data.length !== expected) {
      throw new ShapeMismatchError([expected], [buffer.data.length], `${path} ${item.kind} output`)
    }
  }
}

// ─── Execution ──────────────────────────────────────────────────────────────

function applyRaster(item: RasterItem, { map, bounds }: Projection, ctx: Context, out?: PixelData): RasterItem {
  const integral = map.isIntegerTranslation()
  if (integral) {
    const shift = map.translationPart().map(Math.round)
    if (bounds.equals(item.bounds.translate(shift))) {
      // Pure relabelling: same samples, new bounds.
      if (out === undefined) return withRaster(item, item.data, bounds)
      out.set(item.data)
      return withRaster(item, out, bounds)
    }
  }
  const isMask = item.kind === 'mask-binary' || item.kind === 'mask-multi'
  const warp: WarpOptions = isMask
    ? MASK_WARP
    : { ...ctx.warp, interpolation: integral ? 'nearest' : ctx.warp.interpolation }
  return withRaster(item, ctx.resampler.warp(item, map, bounds, warp, out), bounds)
}

/** Enclosing box of the 2^N mapped corners. */
function mapBox(lower: readonly number[], upper: readonly number[], map: GeometricMap, out: Float64Array): void {
  const dims = lower.length
  const lo = new Array<number>(dims).fill(Infinity)
  const hi = new Array<number>(dims).fill(-Infinity)
  for (let corner = 0; corner < 1 << dims; corner++) {
    const p = lower.map((v, d) => ((corner >> d) & 1 ? upper[d] : v))
    const q = map.apply(p)
    for (let d = 0; d < dims; d++) {
      lo[d] = Math.min(lo[d], q[d])
      hi[d] = Math.max(hi[d], q[d])
    }
  }
  out.set(lo, 0)
  out.set(hi, dims)
}

function applyPoints(item: PointItem, { map, bounds }: Projection, out?: Float64Array): PointItem {
  const dims = item.bounds.dims
  const data = out ?? new Float64Array(item.data.length)
  if (item.kind === 'bounding-box') {
    mapBox(Array.from(item.data.subarray(0, dims)), Array.from(item.data.subarray(dims, 2 * dims)), map, data)
    return withPoints(item, data, bounds)
  }
  for (let i = 0; i < item.data.length; i += dims) {
    const p = Array.from(item.data.subarray(i, i + dims))
    if (p.some(Number.isNaN)) data.fill(Number.NaN, i, i + dims)
    else data.set(map.apply(p), i)
  }
  return withPoints(item, data, bounds)
}

function execute(plan: Plan, ctx: Context, buffer?: Item): Item {
  switch (plan.kind) {
    case 'keep':
      return plan.item
    case 'many':
      return many(plan.plans.map((p, i) => execute(p, ctx, buffer?.kind === 'many' ? buffer.items[i] : undefined)))
    case 'spatial': {
      const { item, projection } = plan
      if (isRaster(item)) {
        return applyRaster(item, projection, ctx, buffer !== undefined && isRaster(buffer) ? buffer.data : undefined)
      }
      return applyPoints(item, projection, buffer !== undefined && isPointSet(buffer) ? buffer.data : undefined)
    }
  }
}

function mapValues(fn: (value: number) => number, item: Item, buffer?: Item): Item {
  if (item.kind === 'many') {
    return many(item.items.map((sub, i) => mapValues(fn, sub, buffer?.kind === 'many' ? buffer.items[i] : undefined)))
  }
  if (item.kind === 'image' || item.kind === 'array') {
    const data = buffer !== undefined && isRaster(buffer) ? buffer.data : allocateLike(item.data, item.data.length)
    const store = quantizer(data)
    for (let i = 0; i < item.data.length; i++) data[i] = store(fn(item.data[i]))
    return { ...item, data }
  }
  return buffer === undefined ? item : copyItemData(buffer, item)
}

function run(t: Transform, item: Item, state: RandomState, ctx: Context, buffer?: Item): Item {
  switch (t.kind) {
    case 'identity':
      return buffer === undefined ? item : copyItemData(buffer, item)
    case 'sequence': {
      const states = stateTuple(state, t.steps.length, 'Sequence')
      const last = t.steps.length - 1
      let current = item
      t.steps.forEach((step, i) => {
        current = run(step, current, states[i], ctx, i === last ? buffer : undefined)
      })
      return current
    }
    case 'one-of': {
      const { index, inner } = choiceState(state, t.options.length, 'OneOf')
      return run(t.options[index], item, inner, ctx, buffer)
    }
    case 'maybe': {
      const { applied, inner } = maybeState(state, 'Maybe')
      if (applied) return run(t.transform, item, inner, ctx, buffer)
      return buffer === undefined ? item : copyItemData(buffer, item)
    }
    case 'map-data':
      nullState(state, describe(t))
      if (buffer !== undefined) checkShapes(buffer, item)
      return mapValues(t.fn, item, buffer)
    default: {
      const plan = planItem(t, item, state)
      if (buffer !== undefined) checkPlan(buffer, plan, item.kind)
      return execute(plan, ctx, buffer)
    }
  }
}

function timed(t: Transform, item: Item, options: ApplyOptions, buffer?: Item): Item {
  const log = options.logger ?? engineLogger()
  const started = performance.now()
  const state = options.state !== undefined ? options.state : getRandomState(t, options.rng ?? defaultRng())
  const result = run(t, item, state, contextFor(options), buffer)
  if (log.isEnabled('debug')) {
    log.debug(buffer === undefined ? 'apply' : 'apply in place', {
      transform: describe(t),
      item: item.kind,
      ms: Math.round((performance.now() - started) * 1000) / 1000,
    })
  }
  return result
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Apply `t` to `item`, returning a new item of the same kind. */
export function apply<I extends Item>(t: Transform, item: I, options?: ApplyOptions): I
export function apply(t: Transform, item: Item, options: ApplyOptions = {}): Item {
  return timed(t, item, options)
}

/**
 * Apply `t` writing the output data into `buffer`'s storage. The buffer
 * must have the shape of the output; shapes are checked for every sub-item
 * before any data is written. Returns the output item, which shares the
 * buffer's storage.
 */
export function applyInPlace<I extends Item>(buffer: I, t: Transform, item: I, options?: ApplyOptions): I
export function applyInPlace(buffer: Item, t: Transform, item: Item, options: ApplyOptions = {}): Item {
  return timed(t, item, options, buffer)
}
