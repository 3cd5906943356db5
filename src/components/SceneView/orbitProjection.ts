// Orthographic projection for the 3D scene view, driven by elevation/azimuth
// like a matplotlib 3D axes: azimuth turns about world Z, elevation tilts toward it.

import type { Vec3 } from '../../utils/vec3'
import type { Project3DTo2D } from './types'
import * as vec3 from '../../utils/vec3'
import { degToRad } from '../../utils/transform'

export interface OrbitView {
  elevation: number
  azimuth: number
  width: number
  height: number
  /** World half-extent that must fit inside the canvas. */
  limit: number
}

export interface OrbitAxes {
  right: Vec3
  up: Vec3
}

export function orbitAxes(elevation: number, azimuth: number): OrbitAxes {
  const el = degToRad(elevation)
  const az = degToRad(azimuth)
  const ce = Math.cos(el)
  const se = Math.sin(el)
  const ca = Math.cos(az)
  const sa = Math.sin(az)

  return {
    right: [-sa, ca, 0],
    up: [-se * ca, -se * sa, ce]
  }
}

export function createOrbitProjector(view: OrbitView): Project3DTo2D {
  const { right, up } = orbitAxes(view.elevation, view.azimuth)
  const pixelsPerUnit = Math.min(view.width, view.height) / (2 * view.limit)
  const cx = view.width / 2
  const cy = view.height / 2

  return (point: Vec3) => ({
    x: cx + vec3.dot(point, right) * pixelsPerUnit,
    y: cy - vec3.dot(point, up) * pixelsPerUnit
  })
}
