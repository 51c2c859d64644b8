import { type ApplyOptions, apply, applyInPlace } from './apply'
import { makeBuffer } from './buffers'
import { ShapeMismatchError } from './errors'
import type { Item } from './items'
import { engineLogger } from './log'
import { defaultRng } from './random'
import { getRandomState } from './random-state'
import { type Transform, describe } from './transform'

/**
 * Stateful wrapper that keeps one output buffer and applies in place on
 * every call after the first. When an input produces a differently shaped
 * output the buffer is reallocated.
 *
 * Items returned from consecutive calls share storage: copy one before the
 * next call if it must be kept.
 */
export class Buffered {
  private buffer: Item | null = null

  constructor(
    readonly transform: Transform,
    private readonly defaults: ApplyOptions = {},
  ) {}

  apply<I extends Item>(item: I, options?: ApplyOptions): I
  apply(item: Item, options: ApplyOptions = {}): Item {
    const merged: ApplyOptions = { ...this.defaults, ...options }
    const state = merged.state !== undefined
      ? merged.state
      : getRandomState(this.transform, merged.rng ?? defaultRng())
    const withState: ApplyOptions = { ...merged, state }

    if (this.buffer !== null) {
      try {
        return applyInPlace(this.buffer, this.transform, item, withState)
      } catch (err) {
        if (!(err instanceof ShapeMismatchError)) throw err
        engineLogger().debug('buffer reallocated', { transform: describe(this.transform), reason: err.message })
      }
    }
    const result = apply(this.transform, item, withState)
    this.buffer = makeBuffer(result)
    return result
  }

  /** Drop the cached buffer. */
  reset(): void {
    this.buffer = null
  }
}
