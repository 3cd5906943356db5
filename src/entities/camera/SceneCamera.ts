import type { IndexedGeometry, Edge } from '../geometry'
import type { Vec3 } from '../../utils/vec3'
import * as vec3 from '../../utils/vec3'
import { SceneGeometryError, invalidArgument } from '../../errors'

/**
 * Orthonormal camera frame. (right, direction, up) is right-handed, the same
 * way world (x, y, z) is: right x direction = up, up x right = direction.
 */
export interface CameraBasis {
  readonly right: Vec3
  readonly up: Vec3
  readonly direction: Vec3
}

export interface SceneCameraOptions {
  position?: Vec3
  upHint?: Vec3
  size?: number
}

export interface SceneCameraSnapshot {
  readonly position: Vec3
  readonly upHint: Vec3
  readonly size: number
  readonly target: Vec3 | null
  readonly basis: CameraBasis | null
  readonly vertices: readonly Vec3[] | null
}

// Below this length a look-at offset or a direction x upHint product counts as zero
const DEGENERATE_EPSILON = 1e-9

// Apex first, then the base corners as (right, up) signs (-,-), (+,-), (+,+), (-,+)
const FRUSTUM_CORNER_SIGNS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [1, -1],
  [1, 1],
  [-1, 1]
]

/** Apex-to-corner edges, then the closed base loop. */
export const FRUSTUM_EDGES: readonly Edge[] = [
  [0, 1], [0, 2], [0, 3], [0, 4],
  [1, 2], [2, 3], [3, 4], [4, 1]
]

function assertFinite(name: string, v: Vec3): void {
  if (!vec3.isFiniteVec(v)) {
    throw invalidArgument(`${name} must be finite, got ${v.join(', ')}`)
  }
}

function assertSize(size: number): void {
  if (!Number.isFinite(size) || size <= 0) {
    throw invalidArgument(`camera size must be a positive number, got ${size}`)
  }
}

function assertUpHint(upHint: Vec3): void {
  assertFinite('upHint', upHint)
  if (vec3.magnitude(upHint) < DEGENERATE_EPSILON) {
    throw invalidArgument('upHint must not be the zero vector')
  }
}

/**
 * Look-at basis for a camera at `position` aimed at `target`.
 * Reads `upHint` only as a reference; the returned `up` is re-orthogonalized.
 */
export function computeBasis(position: Vec3, target: Vec3, upHint: Vec3): CameraBasis {
  const offset = vec3.subtract(target, position)
  if (vec3.magnitude(offset) < DEGENERATE_EPSILON) {
    throw new SceneGeometryError(
      'DegenerateDirection',
      `look-at target ${vec3.toString(target)} coincides with camera position ${vec3.toString(position)}`
    )
  }
  const direction = vec3.normalize(offset)

  const rightRaw = vec3.cross(direction, upHint)
  if (vec3.magnitude(rightRaw) < DEGENERATE_EPSILON * vec3.magnitude(upHint)) {
    throw new SceneGeometryError(
      'DegenerateBasis',
      `view direction ${vec3.toString(direction)} is parallel to up hint ${vec3.toString(upHint)}`
    )
  }
  const right = vec3.normalize(rightRaw)
  const up = vec3.normalize(vec3.cross(right, direction))

  return { right, up, direction }
}

export function frustumVertices(position: Vec3, basis: CameraBasis, size: number): Vec3[] {
  const corners = FRUSTUM_CORNER_SIGNS.map(([sr, su]) => {
    const offset = vec3.add(
      vec3.add(vec3.scale(basis.right, sr), basis.direction),
      vec3.scale(basis.up, su)
    )
    return vec3.add(position, vec3.scale(offset, size))
  })
  return [position, ...corners]
}

/**
 * Camera with an explicit look-at basis and a display frustum.
 *
 * Basis, target and frustum stay null until lookAt() succeeds. Every setter
 * validates and recomputes into locals before writing, so a throwing call
 * leaves the camera exactly as it was.
 */
export class SceneCamera {
  private _position: Vec3
  private _upHint: Vec3
  private _size: number
  private _target: Vec3 | null = null
  private _basis: CameraBasis | null = null
  private _vertices: Vec3[] | null = null

  private constructor(position: Vec3, upHint: Vec3, size: number) {
    this._position = position
    this._upHint = upHint
    this._size = size
  }

  static create(options: SceneCameraOptions = {}): SceneCamera {
    const position: Vec3 = options.position ?? [2, -4, 2]
    const upHint: Vec3 = options.upHint ?? [0, 0, 1]
    const size = options.size ?? 0.3

    assertFinite('position', position)
    assertUpHint(upHint)
    assertSize(size)

    return new SceneCamera(position, upHint, size)
  }

  get position(): Vec3 {
    return this._position
  }

  get upHint(): Vec3 {
    return this._upHint
  }

  get size(): number {
    return this._size
  }

  get target(): Vec3 | null {
    return this._target
  }

  get basis(): CameraBasis | null {
    return this._basis
  }

  get direction(): Vec3 | null {
    return this._basis?.direction ?? null
  }

  get right(): Vec3 | null {
    return this._basis?.right ?? null
  }

  /** Orthonormalized up. Distinct from upHint, which is never overwritten. */
  get up(): Vec3 | null {
    return this._basis?.up ?? null
  }

  get vertices(): readonly Vec3[] | null {
    return this._vertices
  }

  /**
   * Move the camera. With a target set, the camera re-aims at it.
   */
  setPosition(position: Vec3): void {
    assertFinite('position', position)
    if (this._target) {
      const basis = computeBasis(position, this._target, this._upHint)
      this.apply(position, this._upHint, this._size, this._target, basis)
    } else {
      this._position = position
    }
  }

  setSize(size: number): void {
    assertSize(size)
    if (this._basis && this._target) {
      this.apply(this._position, this._upHint, size, this._target, this._basis)
    } else {
      this._size = size
    }
  }

  setUpHint(upHint: Vec3): void {
    assertUpHint(upHint)
    if (this._target) {
      const basis = computeBasis(this._position, this._target, upHint)
      this.apply(this._position, upHint, this._size, this._target, basis)
    } else {
      this._upHint = upHint
    }
  }

  /**
   * Aim at `target`, optionally from a new position `from` in the same step.
   * Always orthogonalizes against the stored upHint, never against the up
   * produced by an earlier call.
   */
  lookAt(target: Vec3, from: Vec3 = this._position): void {
    assertFinite('target', target)
    assertFinite('position', from)
    const basis = computeBasis(from, target, this._upHint)
    this.apply(from, this._upHint, this._size, target, basis)
  }

  /** Apex plus four base corners with their edges, or null before lookAt(). */
  frustum(): IndexedGeometry | null {
    if (!this._vertices) return null
    return { vertices: this._vertices, edges: FRUSTUM_EDGES }
  }

  snapshot(): SceneCameraSnapshot {
    return {
      position: this._position,
      upHint: this._upHint,
      size: this._size,
      target: this._target,
      basis: this._basis,
      vertices: this._vertices ? [...this._vertices] : null
    }
  }

  private apply(position: Vec3, upHint: Vec3, size: number, target: Vec3, basis: CameraBasis): void {
    this._position = position
    this._upHint = upHint
    this._size = size
    this._target = target
    this._basis = basis
    this._vertices = frustumVertices(position, basis, size)
  }
}
