/**
 * Error taxonomy shared by every warpkit package.
 * Errors are thrown synchronously and never retried internally.
 */

/** Base class for all warpkit errors. */
export class WarpkitError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WarpkitError'
  }
}

/** A value defined for one dimensionality was used with another. */
export class DimensionMismatchError extends WarpkitError {
  constructor(
    public readonly expected: number,
    public readonly actual: number,
    context: string,
  ) {
    super(`${context}: expected ${expected} dimensions, got ${actual}`)
    this.name = 'DimensionMismatchError'
  }
}

/** A target size is zero, negative or not an integer. */
export class DegenerateSizeError extends WarpkitError {
  constructor(
    public readonly size: readonly number[],
    context: string,
  ) {
    super(`${context}: degenerate target size (${size.join(', ')})`)
    this.name = 'DegenerateSizeError'
  }
}

/** A map has no inverse. */
export class SingularMapError extends WarpkitError {
  constructor(context: string) {
    super(`${context}: matrix is singular or near-singular`)
    this.name = 'SingularMapError'
  }
}

/** Throw a {@link DegenerateSizeError} unless every entry is a positive integer. */
export function assertValidSize(size: readonly number[], context: string): void {
  if (size.length === 0 || size.some((n) => !Number.isInteger(n) || n <= 0)) {
    throw new DegenerateSizeError(size, context)
  }
}

export function assertDims(expected: number, actual: number, context: string): void {
  if (expected !== actual) throw new DimensionMismatchError(expected, actual, context)
}
