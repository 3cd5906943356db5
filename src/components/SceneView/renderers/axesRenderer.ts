// Coordinate axes rendering

import type { Vec3 } from '../../../utils/vec3'
import type { DrawingContext, Project3DTo2D } from '../types'

export function renderAxes(
  ctx: DrawingContext,
  project3DTo2D: Project3DTo2D,
  axisLength: number = 2
) {
  const origin: Vec3 = [0, 0, 0]

  const axes: Array<{ end: Vec3; color: string; label: string }> = [
    { end: [axisLength, 0, 0], color: '#F44336', label: 'X' },
    { end: [0, axisLength, 0], color: '#4CAF50', label: 'Y' },
    { end: [0, 0, axisLength], color: '#2196F3', label: 'Z' }
  ]

  const originProj = project3DTo2D(origin)

  axes.forEach(axis => {
    const endProj = project3DTo2D(axis.end)

    ctx.beginPath()
    ctx.moveTo(originProj.x, originProj.y)
    ctx.lineTo(endProj.x, endProj.y)
    ctx.strokeStyle = axis.color
    ctx.lineWidth = 2
    ctx.stroke()

    ctx.fillStyle = axis.color
    ctx.font = '14px Arial'
    ctx.fillText(axis.label, endProj.x + 5, endProj.y - 5)
  })
}
