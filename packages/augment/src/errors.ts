/**
 * Errors raised by the augmentation engine. Geometry-level errors are
 * re-exported so callers can catch everything from one module.
 */

import { WarpkitError } from '@warpkit/geometry'

export {
  WarpkitError,
  DimensionMismatchError,
  DegenerateSizeError,
  SingularMapError,
} from '@warpkit/geometry'

/** Data, buffer or output shapes disagree. Raised before anything is written. */
export class ShapeMismatchError extends WarpkitError {
  constructor(
    public readonly expected: readonly number[],
    public readonly actual: readonly number[],
    context: string,
    message = `${context}: expected shape (${expected.join(', ')}), got (${actual.join(', ')})`,
  ) {
    super(message)
    this.name = 'ShapeMismatchError'
  }
}

/** A buffer holds a different kind of item than the one being written. */
export class KindMismatchError extends ShapeMismatchError {
  constructor(
    public readonly expectedKind: string,
    public readonly actualKind: string,
    context: string,
  ) {
    super([], [], context, `${context}: buffer is a ${actualKind} item, expected ${expectedKind}`)
    this.name = 'KindMismatchError'
  }
}

/** A random state does not have the structure its transform draws. */
export class RandomStateError extends WarpkitError {
  constructor(context: string, expected: string) {
    super(`${context}: invalid random state, expected ${expected}`)
    this.name = 'RandomStateError'
  }
}

/** A serialized pipeline failed validation. */
export class PipelineSpecError extends WarpkitError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid pipeline spec: ${issues.join('; ')}`)
    this.name = 'PipelineSpecError'
  }
}
