// Shared types for the 3D scene view and the 2D image view

import type { Vec3 } from '../../utils/vec3'

export interface ScreenPoint {
  x: number
  y: number
}

export type Project3DTo2D = (point: Vec3) => ScreenPoint

/**
 * The slice of CanvasRenderingContext2D the renderers draw with.
 */
export type DrawingContext = Pick<
  CanvasRenderingContext2D,
  | 'beginPath'
  | 'moveTo'
  | 'lineTo'
  | 'closePath'
  | 'stroke'
  | 'fill'
  | 'arc'
  | 'fillText'
  | 'fillRect'
  | 'strokeRect'
  | 'clearRect'
  | 'setLineDash'
  | 'strokeStyle'
  | 'fillStyle'
  | 'lineWidth'
  | 'font'
  | 'globalAlpha'
>

export interface StrokeStyle {
  color: string
  width: number
  dashed?: boolean
}
