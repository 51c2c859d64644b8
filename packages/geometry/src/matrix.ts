/**
 * Small dense linear algebra on row-major `number[][]` matrices.
 * Sized for homogeneous maps (3x3, 4x4), not for bulk numerics.
 */

import { SingularMapError } from './errors'

/** Row-major square or rectangular matrix. */
export type Matrix = readonly (readonly number[])[]

/** n x n identity. */
export function identityMatrix(n: number): number[][] {
  const m: number[][] = []
  for (let r = 0; r < n; r++) {
    const row = new Array<number>(n).fill(0)
    row[r] = 1
    m.push(row)
  }
  return m
}

export function cloneMatrix(m: Matrix): number[][] {
  return m.map((row) => row.slice())
}

/** C = A * B */
export function multiply(a: Matrix, b: Matrix): number[][] {
  const rows = a.length
  const inner = b.length
  const cols = inner === 0 ? 0 : b[0].length
  const c: number[][] = []
  for (let r = 0; r < rows; r++) {
    const row = new Array<number>(cols).fill(0)
    for (let k = 0; k < inner; k++) {
      const v = a[r][k]
      if (v === 0) continue
      for (let col = 0; col < cols; col++) row[col] += v * b[k][col]
    }
    c.push(row)
  }
  return c
}

/** y = M * x */
export function multiplyVector(m: Matrix, x: readonly number[]): number[] {
  return m.map((row) => {
    let sum = 0
    for (let k = 0; k < row.length; k++) sum += row[k] * x[k]
    return sum
  })
}

/** Invert a square matrix via Gauss-Jordan elimination with partial pivoting. */
export function invert(m: Matrix): number[][] {
  const n = m.length
  // Augmented n x 2n system [M | I]
  const aug = m.map((row, r) => {
    const ext = new Array<number>(2 * n).fill(0)
    for (let c = 0; c < n; c++) ext[c] = row[c]
    ext[n + r] = 1
    return ext
  })

  for (let col = 0; col < n; col++) {
    let pivotRow = col
    let pivotAbs = Math.abs(aug[col][col])
    for (let r = col + 1; r < n; r++) {
      const v = Math.abs(aug[r][col])
      if (v > pivotAbs) {
        pivotAbs = v
        pivotRow = r
      }
    }
    if (pivotAbs < 1e-12) throw new SingularMapError('invert')
    if (pivotRow !== col) {
      const tmp = aug[col]
      aug[col] = aug[pivotRow]
      aug[pivotRow] = tmp
    }

    const pivot = aug[col][col]
    for (let j = 0; j < 2 * n; j++) aug[col][j] /= pivot

    for (let r = 0; r < n; r++) {
      if (r === col) continue
      const factor = aug[r][col]
      if (factor === 0) continue
      for (let j = 0; j < 2 * n; j++) aug[r][j] -= factor * aug[col][j]
    }
  }

  return aug.map((row) => row.slice(n))
}

/** Round every entry to `digits` decimal places. */
export function roundMatrix(m: Matrix, digits: number): number[][] {
  const scale = 10 ** digits
  return m.map((row) => row.map((v) => Math.round(v * scale) / scale + 0))
}
