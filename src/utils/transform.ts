/**
 * Rotation and homogeneous transform helpers.
 *
 * Matrices are row-major number[][] (m[row][col]). Euler angles are applied
 * X, then Y, then Z, which composes as Rz * Ry * Rx.
 */

import type { Vec3 } from './vec3'

export type Mat3 = number[][]
export type Mat4 = number[][]

export function degToRad(degrees: number): number {
  return degrees * Math.PI / 180
}

export function identity(size: number): number[][] {
  return Array.from({ length: size }, (_, i) =>
    Array.from({ length: size }, (_, j) => (i === j ? 1 : 0))
  )
}

export function rotationX(radians: number): Mat3 {
  const c = Math.cos(radians)
  const s = Math.sin(radians)
  return [
    [1, 0, 0],
    [0, c, -s],
    [0, s, c]
  ]
}

export function rotationY(radians: number): Mat3 {
  const c = Math.cos(radians)
  const s = Math.sin(radians)
  return [
    [c, 0, s],
    [0, 1, 0],
    [-s, 0, c]
  ]
}

export function rotationZ(radians: number): Mat3 {
  const c = Math.cos(radians)
  const s = Math.sin(radians)
  return [
    [c, -s, 0],
    [s, c, 0],
    [0, 0, 1]
  ]
}

/**
 * Rotation for Euler angles given in degrees as [rx, ry, rz].
 */
export function eulerToMatrix(rotationDegrees: Vec3): Mat3 {
  const [rx, ry, rz] = rotationDegrees
  return multiply(rotationZ(degToRad(rz)), multiply(rotationY(degToRad(ry)), rotationX(degToRad(rx))))
}

/**
 * Multiply two matrices of compatible shape (A is n x k, B is k x m).
 */
export function multiply(A: number[][], B: number[][]): number[][] {
  const rows = A.length
  const inner = B.length
  const cols = B[0].length
  if (A[0].length !== inner) {
    throw new Error(`transform.multiply: shape mismatch ${rows}x${A[0].length} * ${inner}x${cols}`)
  }

  const result: number[][] = Array.from({ length: rows }, () => Array<number>(cols).fill(0))
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      for (let k = 0; k < inner; k++) {
        result[i][j] += A[i][k] * B[k][j]
      }
    }
  }
  return result
}

export function determinant3(M: Mat3): number {
  return (
    M[0][0] * (M[1][1] * M[2][2] - M[1][2] * M[2][1]) -
    M[0][1] * (M[1][0] * M[2][2] - M[1][2] * M[2][0]) +
    M[0][2] * (M[1][0] * M[2][1] - M[1][1] * M[2][0])
  )
}

export function multiplyMat3Vec3(M: Mat3, v: Vec3): Vec3 {
  return [
    M[0][0] * v[0] + M[0][1] * v[1] + M[0][2] * v[2],
    M[1][0] * v[0] + M[1][1] * v[1] + M[1][2] * v[2],
    M[2][0] * v[0] + M[2][1] * v[1] + M[2][2] * v[2]
  ]
}

/**
 * Matrix whose columns are the given vectors.
 */
export function fromColumns(c0: Vec3, c1: Vec3, c2: Vec3): Mat3 {
  return [
    [c0[0], c1[0], c2[0]],
    [c0[1], c1[1], c2[1]],
    [c0[2], c1[2], c2[2]]
  ]
}

export function fromRows(r0: Vec3, r1: Vec3, r2: Vec3): Mat3 {
  return [
    [r0[0], r0[1], r0[2]],
    [r1[0], r1[1], r1[2]],
    [r2[0], r2[1], r2[2]]
  ]
}

export function translationMatrix(t: Vec3): Mat4 {
  return [
    [1, 0, 0, t[0]],
    [0, 1, 0, t[1]],
    [0, 0, 1, t[2]],
    [0, 0, 0, 1]
  ]
}

/**
 * Lift a 3x3 rotation and a translation into a 4x4 homogeneous transform [R t; 0 1].
 */
export function homogeneous(R: Mat3, t: Vec3 = [0, 0, 0]): Mat4 {
  return [
    [R[0][0], R[0][1], R[0][2], t[0]],
    [R[1][0], R[1][1], R[1][2], t[1]],
    [R[2][0], R[2][1], R[2][2], t[2]],
    [0, 0, 0, 1]
  ]
}

/**
 * Compose homogeneous transforms left to right: compose(A, B, C) = A * B * C,
 * so C is applied to a point first.
 */
export function compose(...transforms: Mat4[]): Mat4 {
  return transforms.reduce((acc, m) => multiply(acc, m), identity(4))
}

export function transformPoint4(M: Mat4, p: Vec3): Vec3 {
  const x = M[0][0] * p[0] + M[0][1] * p[1] + M[0][2] * p[2] + M[0][3]
  const y = M[1][0] * p[0] + M[1][1] * p[1] + M[1][2] * p[2] + M[1][3]
  const z = M[2][0] * p[0] + M[2][1] * p[1] + M[2][2] * p[2] + M[2][3]
  const w = M[3][0] * p[0] + M[3][1] * p[1] + M[3][2] * p[2] + M[3][3]
  return [x / w, y / w, z / w]
}
