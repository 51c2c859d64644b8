/**
 * GeometricMap: an immutable projective map on N-dimensional points,
 * stored as a homogeneous (N+1)x(N+1) matrix.
 *
 * Composition follows pipeline order: `f.then(g)` applies f first, then g,
 * which is the matrix product G * F. Composition is associative but not
 * commutative.
 */

import { DimensionMismatchError, WarpkitError } from './errors'
import {
  type Matrix,
  cloneMatrix,
  identityMatrix,
  invert,
  multiply,
  multiplyVector,
} from './matrix'

export type Point = readonly number[]

export class GeometricMap {
  /** Number of spatial dimensions the map acts on. */
  readonly dims: number
  private readonly h: number[][]
  private inverseCache: GeometricMap | null = null

  private constructor(h: number[][]) {
    this.h = h
    this.dims = h.length - 1
  }

  // ─── Constructors ─────────────────────────────────────────────────────────

  static identity(dims: number): GeometricMap {
    return new GeometricMap(identityMatrix(dims + 1))
  }

  /** Wrap a homogeneous (N+1)x(N+1) matrix. */
  static fromMatrix(h: Matrix): GeometricMap {
    const n = h.length
    if (n < 2 || h.some((row) => row.length !== n)) {
      throw new WarpkitError(`GeometricMap.fromMatrix: expected a square matrix of size >= 2, got ${n}x${h[0]?.length ?? 0}`)
    }
    return new GeometricMap(cloneMatrix(h))
  }

  static translation(offsets: readonly number[]): GeometricMap {
    const h = identityMatrix(offsets.length + 1)
    offsets.forEach((o, i) => {
      h[i][offsets.length] = o
    })
    return new GeometricMap(h)
  }

  static scaling(ratios: readonly number[]): GeometricMap {
    const h = identityMatrix(ratios.length + 1)
    ratios.forEach((r, i) => {
      h[i][i] = r
    })
    return new GeometricMap(h)
  }

  /** Linear map `x -> A x + offset`. */
  static linear(a: Matrix, offset?: readonly number[]): GeometricMap {
    const n = a.length
    if (a.some((row) => row.length !== n)) {
      throw new WarpkitError('GeometricMap.linear: linear part must be square')
    }
    if (offset && offset.length !== n) {
      throw new DimensionMismatchError(n, offset.length, 'GeometricMap.linear offset')
    }
    const h = identityMatrix(n + 1)
    for (let r = 0; r < n; r++) {
      for (let c = 0; c < n; c++) h[r][c] = a[r][c]
      h[r][n] = offset ? offset[r] : 0
    }
    return new GeometricMap(h)
  }

  /** Counter-clockwise rotation in the (axis 0, axis 1) plane about the origin. */
  static rotation2d(radians: number): GeometricMap {
    const c = Math.cos(radians)
    const s = Math.sin(radians)
    return GeometricMap.linear([
      [c, -s],
      [s, c],
    ])
  }

  // ─── Inspection ───────────────────────────────────────────────────────────

  /** Copy of the homogeneous matrix. */
  get matrix(): number[][] {
    return cloneMatrix(this.h)
  }

  linearPart(): number[][] {
    return this.h.slice(0, this.dims).map((row) => row.slice(0, this.dims))
  }

  translationPart(): number[] {
    return this.h.slice(0, this.dims).map((row) => row[this.dims])
  }

  /** True when the last row is [0 … 0 1]. */
  isAffine(tol = 1e-12): boolean {
    const last = this.h[this.dims]
    return last.every((v, i) => Math.abs(v - (i === this.dims ? 1 : 0)) <= tol)
  }

  isIdentity(tol = 1e-9): boolean {
    return this.h.every((row, r) => row.every((v, c) => Math.abs(v - (r === c ? 1 : 0)) <= tol))
  }

  /** True for a pure translation whose offsets are all integers. */
  isIntegerTranslation(tol = 1e-9): boolean {
    if (!this.isAffine(tol)) return false
    const linear = this.linearPart()
    const unit = linear.every((row, r) => row.every((v, c) => Math.abs(v - (r === c ? 1 : 0)) <= tol))
    return unit && this.translationPart().every((t) => Math.abs(t - Math.round(t)) <= tol)
  }

  approxEquals(other: GeometricMap, tol = 1e-9): boolean {
    if (other.dims !== this.dims) return false
    return this.h.every((row, r) => row.every((v, c) => Math.abs(v - other.h[r][c]) <= tol))
  }

  // ─── Algebra ──────────────────────────────────────────────────────────────

  apply(point: Point): number[] {
    if (point.length !== this.dims) {
      throw new DimensionMismatchError(this.dims, point.length, 'GeometricMap.apply')
    }
    const hp = multiplyVector(this.h, [...point, 1])
    const w = hp[this.dims]
    if (w === 1) return hp.slice(0, this.dims)
    return hp.slice(0, this.dims).map((v) => v / w)
  }

  /** Apply this map, then `next`. */
  then(next: GeometricMap): GeometricMap {
    if (next.dims !== this.dims) {
      throw new DimensionMismatchError(this.dims, next.dims, 'GeometricMap.then')
    }
    return new GeometricMap(multiply(next.h, this.h))
  }

  inverse(): GeometricMap {
    if (this.inverseCache === null) {
      this.inverseCache = new GeometricMap(invert(this.h))
    }
    return this.inverseCache
  }

  /** The same map acting about `center` instead of the origin. */
  recenter(center: Point): GeometricMap {
    if (center.length !== this.dims) {
      throw new DimensionMismatchError(this.dims, center.length, 'GeometricMap.recenter')
    }
    return GeometricMap.translation(center.map((c) => -c))
      .then(this)
      .then(GeometricMap.translation(center))
  }

  toString(): string {
    return `GeometricMap(${this.h.map((row) => `[${row.map((v) => +v.toFixed(6)).join(', ')}]`).join(', ')})`
  }
}

/** Compose maps in application order: the first argument is applied first. */
export function composeMaps(first: GeometricMap, ...rest: GeometricMap[]): GeometricMap {
  return rest.reduce((acc, m) => acc.then(m), first)
}
