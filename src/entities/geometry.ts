import type { Vec3 } from '../utils/vec3'

/** Pair of indices into a vertex list. */
export type Edge = readonly [number, number]

/**
 * Vertex list plus index-pair edges. Every primitive hands its geometry out in
 * this shape, so projected points map back to edges by index.
 */
export interface IndexedGeometry {
  readonly vertices: readonly Vec3[]
  readonly edges: readonly Edge[]
}

/**
 * Endpoint coordinates of every edge, in edge order.
 */
export function edgeSegments(geometry: IndexedGeometry): Array<readonly [Vec3, Vec3]> {
  return geometry.edges.map(([start, end]) => [geometry.vertices[start], geometry.vertices[end]] as const)
}
