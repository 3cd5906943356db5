// Initial scene and control ranges for the explorer

import type { Vec3 } from '../utils/vec3'
import type { RotationConvention } from '../projection/pinhole'

export interface SceneDefaults {
  camera: { position: Vec3; upHint: Vec3; size: number }
  cube: { origin: Vec3; size: number }
  plane: { center: Vec3; rotation: Vec3; scale: number; resolution: number; visible: boolean }
  view: { elevation: number; azimuth: number; limit: number }
  ranges: {
    position: readonly [number, number]
    elevation: readonly [number, number]
    azimuth: readonly [number, number]
  }
  convention: RotationConvention
}

export const SCENE_DEFAULTS: SceneDefaults = {
  camera: { position: [2, -4, 2], upHint: [0, 0, 1], size: 0.3 },
  cube: { origin: [0, 0, 0], size: 1 },
  plane: { center: [0.5, 0.5, 0], rotation: [0, 0, 0], scale: 2, resolution: 10, visible: false },
  // 3D view: matplotlib-style elevation/azimuth in degrees, axes spanning [-limit, limit]
  view: { elevation: 20, azimuth: 45, limit: 5 },
  ranges: {
    position: [-5, 5],
    elevation: [-90, 90],
    azimuth: [0, 360]
  },
  convention: 'look-at'
}
