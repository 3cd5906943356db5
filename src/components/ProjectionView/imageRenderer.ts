// 2D image-plane rendering of projected geometry

import type { CameraIntrinsics } from '../../projection/intrinsics'
import type { ProjectedGeometry, ProjectedPoint } from '../../projection/pinhole'
import type { DrawingContext, ScreenPoint } from '../SceneView/types'
import { renderEdges, renderPoints } from '../SceneView/renderers/edgeRenderer'

/**
 * Map image pixels onto a canvas of the given size, keeping the aspect ratio.
 * Image y already points down, so no flip is needed.
 */
export function imageToCanvas(
  intrinsics: CameraIntrinsics,
  canvasWidth: number,
  canvasHeight: number
): (point: Pick<ProjectedPoint, 'u' | 'v'>) => ScreenPoint {
  const s = Math.min(canvasWidth / intrinsics.width, canvasHeight / intrinsics.height)
  const offsetX = (canvasWidth - intrinsics.width * s) / 2
  const offsetY = (canvasHeight - intrinsics.height * s) / 2
  return point => ({ x: offsetX + point.u * s, y: offsetY + point.v * s })
}

export function renderImageFrame(
  ctx: DrawingContext,
  intrinsics: CameraIntrinsics,
  toCanvas: (point: Pick<ProjectedPoint, 'u' | 'v'>) => ScreenPoint
) {
  const topLeft = toCanvas({ u: 0, v: 0 })
  const bottomRight = toCanvas({ u: intrinsics.width, v: intrinsics.height })

  ctx.fillStyle = '#ffffff'
  ctx.fillRect(topLeft.x, topLeft.y, bottomRight.x - topLeft.x, bottomRight.y - topLeft.y)
  ctx.strokeStyle = '#9e9e9e'
  ctx.lineWidth = 1
  ctx.strokeRect(topLeft.x, topLeft.y, bottomRight.x - topLeft.x, bottomRight.y - topLeft.y)

  // Principal point crosshair
  const pp = toCanvas({ u: intrinsics.cx, v: intrinsics.cy })
  ctx.setLineDash([2, 3])
  ctx.beginPath()
  ctx.moveTo(pp.x - 8, pp.y)
  ctx.lineTo(pp.x + 8, pp.y)
  ctx.moveTo(pp.x, pp.y - 8)
  ctx.lineTo(pp.x, pp.y + 8)
  ctx.stroke()
  ctx.setLineDash([])
}

/**
 * Draw projected edges and points. Edges whose endpoints were depth-clamped are dashed.
 */
export function renderProjected(
  ctx: DrawingContext,
  projected: ProjectedGeometry | null,
  toCanvas: (point: Pick<ProjectedPoint, 'u' | 'v'>) => ScreenPoint,
  colors: { edge: string; point?: string }
) {
  if (!projected) return

  const points = projected.points.map(toCanvas)
  const solid = projected.edges.filter(([a, b]) => !projected.points[a].clamped && !projected.points[b].clamped)
  const clamped = projected.edges.filter(([a, b]) => projected.points[a].clamped || projected.points[b].clamped)

  renderEdges(ctx, points, solid, { color: colors.edge, width: 2 })
  renderEdges(ctx, points, clamped, { color: colors.edge, width: 1, dashed: true })
  if (colors.point) {
    renderPoints(ctx, points, colors.point, 4)
  }
}
