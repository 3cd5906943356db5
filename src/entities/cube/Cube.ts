import type { IndexedGeometry, Edge } from '../geometry'
import type { Vec3 } from '../../utils/vec3'
import * as vec3 from '../../utils/vec3'
import { edgeSegments } from '../geometry'
import { invalidArgument } from '../../errors'

// Corner offsets in units of the edge length; index i has bits (x, y, z) = (i & 1, i & 2, i & 4)
const CORNER_OFFSETS: readonly Vec3[] = [
  [0, 0, 0], [1, 0, 0], [0, 1, 0], [1, 1, 0],
  [0, 0, 1], [1, 0, 1], [0, 1, 1], [1, 1, 1]
]

export const CUBE_EDGES: readonly Edge[] = [
  [0, 1], [0, 2], [0, 4], [1, 3], [1, 5], [2, 3],
  [2, 6], [4, 5], [4, 6], [7, 3], [7, 5], [7, 6]
]

function assertSize(size: number): void {
  if (!Number.isFinite(size) || size <= 0) {
    throw invalidArgument(`cube size must be a positive number, got ${size}`)
  }
}

function assertOrigin(origin: Vec3): void {
  if (!vec3.isFiniteVec(origin)) {
    throw invalidArgument(`cube origin must be finite, got ${origin.join(', ')}`)
  }
}

/**
 * Axis-aligned cube with `origin` at its minimum corner.
 */
export class Cube {
  private _origin: Vec3
  private _size: number
  private _vertices: Vec3[]

  private constructor(origin: Vec3, size: number) {
    this._origin = origin
    this._size = size
    this._vertices = Cube.cornerVertices(origin, size)
  }

  static create(origin: Vec3 = [0, 0, 0], size: number = 1): Cube {
    assertOrigin(origin)
    assertSize(size)
    return new Cube(origin, size)
  }

  private static cornerVertices(origin: Vec3, size: number): Vec3[] {
    return CORNER_OFFSETS.map(offset => vec3.add(origin, vec3.scale(offset, size)))
  }

  get origin(): Vec3 {
    return this._origin
  }

  get size(): number {
    return this._size
  }

  get center(): Vec3 {
    const half = this._size / 2
    return vec3.add(this._origin, [half, half, half])
  }

  get vertices(): readonly Vec3[] {
    return this._vertices
  }

  get edges(): readonly Edge[] {
    return CUBE_EDGES
  }

  geometry(): IndexedGeometry {
    return { vertices: this._vertices, edges: CUBE_EDGES }
  }

  /** Coordinate pairs for each edge, for consumers that draw segments directly. */
  edgeSegments(): Array<readonly [Vec3, Vec3]> {
    return edgeSegments(this.geometry())
  }

  setOrigin(origin: Vec3): void {
    assertOrigin(origin)
    this._origin = origin
    this._vertices = Cube.cornerVertices(origin, this._size)
  }

  setSize(size: number): void {
    assertSize(size)
    this._size = size
    this._vertices = Cube.cornerVertices(this._origin, size)
  }
}
