import type { IndexedGeometry, Edge } from '../geometry'
import type { Vec3 } from '../../utils/vec3'
import type { Mat4 } from '../../utils/transform'
import * as vec3 from '../../utils/vec3'
import { compose, eulerToMatrix, homogeneous, transformPoint4, translationMatrix } from '../../utils/transform'
import { invalidArgument } from '../../errors'

/**
 * World coordinates of the grid, one resolution x resolution array per axis.
 * Row index follows local Y, column index follows local X.
 */
export interface PlaneSurface {
  readonly x: number[][]
  readonly y: number[][]
  readonly z: number[][]
}

export interface PlaneOptions {
  center?: Vec3
  /** Euler angles in degrees, applied X then Y then Z. */
  rotation?: Vec3
  scale?: number
  resolution?: number
}

/**
 * `count` evenly spaced samples from start to stop inclusive.
 */
export function linspace(start: number, stop: number, count: number): number[] {
  if (count === 1) return [start]
  const step = (stop - start) / (count - 1)
  return Array.from({ length: count }, (_, i) => (i === count - 1 ? stop : start + step * i))
}

function gridEdges(resolution: number): Edge[] {
  const edges: Edge[] = []
  for (let row = 0; row < resolution; row++) {
    for (let col = 0; col < resolution; col++) {
      const index = row * resolution + col
      if (col + 1 < resolution) edges.push([index, index + 1])
      if (row + 1 < resolution) edges.push([index, index + resolution])
    }
  }
  return edges
}

function assertScale(scale: number): void {
  if (!Number.isFinite(scale) || scale <= 0) {
    throw invalidArgument(`plane scale must be a positive number, got ${scale}`)
  }
}

function assertResolution(resolution: number): void {
  if (!Number.isInteger(resolution) || resolution < 1) {
    throw invalidArgument(`plane resolution must be a positive integer, got ${resolution}`)
  }
}

function assertFinite(name: string, v: Vec3): void {
  if (!vec3.isFiniteVec(v)) {
    throw invalidArgument(`plane ${name} must be finite, got ${v.join(', ')}`)
  }
}

/**
 * Square grid in its local XY plane, rotated and then translated to `center`.
 */
export class Plane {
  private _center: Vec3
  private _rotation: Vec3
  private _scale: number
  private _resolution: number
  private _transform: Mat4
  private _vertices: Vec3[]
  private _edges: Edge[]
  private _surface: PlaneSurface

  private constructor(center: Vec3, rotation: Vec3, scale: number, resolution: number) {
    this._center = center
    this._rotation = rotation
    this._scale = scale
    this._resolution = resolution
    this._transform = compose(translationMatrix(center), homogeneous(eulerToMatrix(rotation)))
    this._vertices = this.gridVertices()
    this._edges = gridEdges(resolution)
    this._surface = this.toSurface()
  }

  static create(options: PlaneOptions = {}): Plane {
    const center: Vec3 = options.center ?? [0, 0, 0]
    const rotation: Vec3 = options.rotation ?? [0, 0, 0]
    const scale = options.scale ?? 5
    const resolution = options.resolution ?? 10

    assertFinite('center', center)
    assertFinite('rotation', rotation)
    assertScale(scale)
    assertResolution(resolution)

    return new Plane(center, rotation, scale, resolution)
  }

  get center(): Vec3 {
    return this._center
  }

  get rotation(): Vec3 {
    return this._rotation
  }

  get scale(): number {
    return this._scale
  }

  get resolution(): number {
    return this._resolution
  }

  /** Local-to-world transform T * Rz * Ry * Rx. */
  get transform(): Mat4 {
    return this._transform
  }

  get surface(): PlaneSurface {
    return this._surface
  }

  /** Grid points in row-major order: index = row * resolution + col. */
  get vertices(): readonly Vec3[] {
    return this._vertices
  }

  get edges(): readonly Edge[] {
    return this._edges
  }

  geometry(): IndexedGeometry {
    return { vertices: this._vertices, edges: this._edges }
  }

  setCenter(center: Vec3): void {
    assertFinite('center', center)
    this._center = center
    this.recompute()
  }

  setRotation(rotation: Vec3): void {
    assertFinite('rotation', rotation)
    this._rotation = rotation
    this.recompute()
  }

  setScale(scale: number): void {
    assertScale(scale)
    this._scale = scale
    this.recompute()
  }

  setResolution(resolution: number): void {
    assertResolution(resolution)
    this._resolution = resolution
    this._edges = gridEdges(resolution)
    this.recompute()
  }

  private recompute(): void {
    this._transform = compose(translationMatrix(this._center), homogeneous(eulerToMatrix(this._rotation)))
    this._vertices = this.gridVertices()
    this._surface = this.toSurface()
  }

  private gridVertices(): Vec3[] {
    const samples = linspace(-this._scale, this._scale, this._resolution)
    const vertices: Vec3[] = []
    for (const y of samples) {
      for (const x of samples) {
        vertices.push(transformPoint4(this._transform, [x, y, 0]))
      }
    }
    return vertices
  }

  private toSurface(): PlaneSurface {
    const n = this._resolution
    const rows = (axis: 0 | 1 | 2) =>
      Array.from({ length: n }, (_, row) =>
        Array.from({ length: n }, (_, col) => this._vertices[row * n + col][axis])
      )
    return { x: rows(0), y: rows(1), z: rows(2) }
  }
}
