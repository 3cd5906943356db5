/**
 * Pinhole projection of world points through a look-at camera.
 * Based on the standard model x = K [R | t] X, with a near-plane depth clamp
 * instead of culling.
 */

import type { CameraBasis } from '../entities/camera/SceneCamera'
import type { Edge, IndexedGeometry } from '../entities/geometry'
import type { Mat3 } from '../utils/transform'
import type { Vec3 } from '../utils/vec3'
import type { CameraIntrinsics } from './intrinsics'
import * as vec3 from '../utils/vec3'
import { fromColumns, fromRows, multiply, multiplyMat3Vec3 } from '../utils/transform'
import { DEFAULT_INTRINSICS, intrinsicsMatrix, validateIntrinsics } from './intrinsics'
import { SceneGeometryError, invalidArgument } from '../errors'

/**
 * How the world-to-camera rotation is laid out.
 * - 'look-at': rows [right, -up, direction]; the target lands on the principal point
 * - 'legacy': columns [right, up x right, up], kept for reproducing older output
 */
export type RotationConvention = 'look-at' | 'legacy'

export const NEAR_PLANE_DEPTH = 0.1

export interface Extrinsics {
  rotation: Mat3
  translation: Vec3
}

/** Anything with a position and a (possibly missing) look-at basis. */
export interface CameraPose {
  readonly position: Vec3
  readonly basis: CameraBasis | null
}

export interface ProjectionOptions {
  intrinsics?: CameraIntrinsics
  convention?: RotationConvention
  nearPlane?: number
}

export interface ProjectedPoint {
  /** Index of the source point. */
  index: number
  u: number
  v: number
  /** Camera-space depth before clamping. */
  depth: number
  /** True when depth was raised to the near plane before dividing. */
  clamped: boolean
}

export interface ProjectedGeometry {
  points: ProjectedPoint[]
  edges: readonly Edge[]
}

export function buildExtrinsics(
  basis: CameraBasis,
  position: Vec3,
  convention: RotationConvention = 'look-at'
): Extrinsics {
  const rotation = convention === 'legacy'
    ? fromColumns(basis.right, vec3.cross(basis.up, basis.right), basis.up)
    : fromRows(basis.right, vec3.negate(basis.up), basis.direction)
  const translation = vec3.negate(multiplyMat3Vec3(rotation, position))
  return { rotation, translation }
}

export function cameraExtrinsics(camera: CameraPose, convention: RotationConvention = 'look-at'): Extrinsics {
  if (!camera.basis) {
    throw invalidArgument('camera has no orientation yet; call lookAt() before projecting')
  }
  return buildExtrinsics(camera.basis, camera.position, convention)
}

/**
 * Project one point with already built extrinsics and K.
 */
export function projectWithExtrinsics(
  point: Vec3,
  extrinsics: Extrinsics,
  K: Mat3,
  nearPlane: number = NEAR_PLANE_DEPTH
): Omit<ProjectedPoint, 'index'> {
  const transformed = vec3.add(multiplyMat3Vec3(extrinsics.rotation, point), extrinsics.translation)
  const depth = transformed[2]
  const clamped = depth < nearPlane
  const z = clamped ? nearPlane : depth

  const x = transformed[0] / z
  const y = transformed[1] / z
  const pixel = multiplyMat3Vec3(K, [x, y, 1])

  return { u: pixel[0], v: pixel[1], depth, clamped }
}

export function projectPoints(
  points: readonly Vec3[],
  camera: CameraPose,
  options: ProjectionOptions = {}
): ProjectedPoint[] {
  const intrinsics = options.intrinsics ?? DEFAULT_INTRINSICS
  validateIntrinsics(intrinsics)
  const nearPlane = options.nearPlane ?? NEAR_PLANE_DEPTH
  if (!Number.isFinite(nearPlane) || nearPlane <= 0) {
    throw invalidArgument(`near plane must be a positive number, got ${nearPlane}`)
  }

  const extrinsics = cameraExtrinsics(camera, options.convention)
  const K = intrinsicsMatrix(intrinsics)

  return points.map((point, index) => ({
    index,
    ...projectWithExtrinsics(point, extrinsics, K, nearPlane)
  }))
}

/**
 * Project a vertex/edge list. Edges are passed through untouched: edge [i, j]
 * connects points[i] and points[j].
 */
export function projectGeometry(
  geometry: IndexedGeometry,
  camera: CameraPose,
  options: ProjectionOptions = {}
): ProjectedGeometry {
  return {
    points: projectPoints(geometry.vertices, camera, options),
    edges: geometry.edges
  }
}

/** P = K [R | t], a 3x4 matrix. */
export function projectionMatrix(K: Mat3, extrinsics: Extrinsics): number[][] {
  const { rotation: R, translation: t } = extrinsics
  const Rt = [
    [R[0][0], R[0][1], R[0][2], t[0]],
    [R[1][0], R[1][1], R[1][2], t[1]],
    [R[2][0], R[2][1], R[2][2], t[2]]
  ]
  return multiply(K, Rt)
}

/**
 * Strict homogeneous projection through P, without the near-plane clamp.
 * Points on the camera's principal plane (w = 0) have no image.
 */
export function projectWithMatrix(P: number[][], point: Vec3): [number, number] {
  const homogeneousPoint = [point[0], point[1], point[2], 1]
  const [x, y, w] = P.map(row => row.reduce((sum, value, i) => sum + value * homogeneousPoint[i], 0))
  if (Math.abs(w) < 1e-12) {
    throw new SceneGeometryError(
      'DegenerateDirection',
      `point ${vec3.toString(point)} lies on the camera plane and has no projection`
    )
  }
  return [x / w, y / w]
}

export function isInsideImage(point: Pick<ProjectedPoint, 'u' | 'v'>, intrinsics: CameraIntrinsics = DEFAULT_INTRINSICS): boolean {
  return point.u >= 0 && point.u < intrinsics.width && point.v >= 0 && point.v < intrinsics.height
}
