import type { DrawingContext, ScreenPoint, StrokeStyle } from '../types'
import type { Edge } from '../../../entities/geometry'

export function renderEdges(
  ctx: DrawingContext,
  points: readonly ScreenPoint[],
  edges: readonly Edge[],
  style: StrokeStyle
) {
  ctx.strokeStyle = style.color
  ctx.lineWidth = style.width
  ctx.setLineDash(style.dashed ? [4, 4] : [])

  edges.forEach(([start, end]) => {
    const a = points[start]
    const b = points[end]
    if (!a || !b) return

    ctx.beginPath()
    ctx.moveTo(a.x, a.y)
    ctx.lineTo(b.x, b.y)
    ctx.stroke()
  })

  ctx.setLineDash([])
}

export function renderPoints(
  ctx: DrawingContext,
  points: readonly ScreenPoint[],
  color: string,
  radius: number
) {
  ctx.fillStyle = color
  points.forEach(point => {
    ctx.beginPath()
    ctx.arc(point.x, point.y, radius, 0, Math.PI * 2)
    ctx.fill()
  })
}
