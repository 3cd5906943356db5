/**
 * Utility functions for 3D vector operations on plain number tuples.
 * Every geometry type in the scene stores points as Vec3.
 */

export type Vec3 = readonly [number, number, number]

export function add(a: Vec3, b: Vec3): Vec3 {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]]
}

export function subtract(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]]
}

export function scale(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s]
}

export function negate(v: Vec3): Vec3 {
  return [-v[0], -v[1], -v[2]]
}

export function sqrMagnitude(v: Vec3): number {
  return v[0] * v[0] + v[1] * v[1] + v[2] * v[2]
}

export function magnitude(v: Vec3): number {
  return Math.sqrt(sqrMagnitude(v))
}

/**
 * Unit vector in the direction of v. Returns the zero vector below epsilon;
 * callers that must reject degenerate input check the magnitude first.
 */
export function normalize(v: Vec3, epsilon: number = 1e-10): Vec3 {
  const mag = magnitude(v)
  if (mag < epsilon) {
    return [0, 0, 0]
  }
  return [v[0] / mag, v[1] / mag, v[2] / mag]
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2]
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0]
  ]
}

export function distance(a: Vec3, b: Vec3): number {
  return magnitude(subtract(a, b))
}

export function equals(a: Vec3, b: Vec3, tolerance: number = 1e-6): boolean {
  return (
    Math.abs(a[0] - b[0]) < tolerance &&
    Math.abs(a[1] - b[1]) < tolerance &&
    Math.abs(a[2] - b[2]) < tolerance
  )
}

export function isFiniteVec(v: Vec3): boolean {
  return Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2])
}

export function toString(v: Vec3, decimals: number = 3): string {
  return `[${v[0].toFixed(decimals)}, ${v[1].toFixed(decimals)}, ${v[2].toFixed(decimals)}]`
}
