// Cube, camera frustum and plane rendering for the 3D scene view

import type { IndexedGeometry } from '../../../entities/geometry'
import type { DrawingContext, Project3DTo2D } from '../types'
import { renderEdges, renderPoints } from './edgeRenderer'

export function renderCube(ctx: DrawingContext, cube: IndexedGeometry, project3DTo2D: Project3DTo2D) {
  const points = cube.vertices.map(project3DTo2D)
  renderEdges(ctx, points, cube.edges, { color: '#E53935', width: 2 })
  renderPoints(ctx, points, '#1E88E5', 4)
}

/**
 * Frustum edges in green with a marker on the apex (vertex 0).
 */
export function renderFrustum(ctx: DrawingContext, frustum: IndexedGeometry | null, project3DTo2D: Project3DTo2D) {
  if (!frustum) return

  const points = frustum.vertices.map(project3DTo2D)
  renderEdges(ctx, points, frustum.edges, { color: '#43A047', width: 2 })
  renderPoints(ctx, points.slice(0, 1), '#43A047', 6)
}

export function renderPlane(ctx: DrawingContext, plane: IndexedGeometry | null, project3DTo2D: Project3DTo2D) {
  if (!plane) return

  const points = plane.vertices.map(project3DTo2D)
  ctx.globalAlpha = 0.5
  renderEdges(ctx, points, plane.edges, { color: '#FBC02D', width: 1 })
  ctx.globalAlpha = 1
}
