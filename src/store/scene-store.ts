import { makeAutoObservable, observable } from 'mobx'
import type { Vec3 } from '../utils/vec3'
import type { IndexedGeometry } from '../entities/geometry'
import type { PlaneSurface } from '../entities/plane/Plane'
import type { CameraIntrinsics } from '../projection/intrinsics'
import type { ProjectedGeometry, RotationConvention } from '../projection/pinhole'
import type { SceneDefaults } from '../config/scene-defaults'
import { SceneCamera } from '../entities/camera/SceneCamera'
import { Cube } from '../entities/cube/Cube'
import { Plane } from '../entities/plane/Plane'
import { projectGeometry } from '../projection/pinhole'
import { DEFAULT_INTRINSICS, validateIntrinsics } from '../projection/intrinsics'
import { SCENE_DEFAULTS } from '../config/scene-defaults'
import { isSceneGeometryError } from '../errors'
import { logDebug, logInfo, logRejection, warnOnce } from '../logging/scene-logger'
import * as vec3 from '../utils/vec3'

export type CameraAxis = 'x' | 'y' | 'z'

const AXIS_INDEX: Record<CameraAxis, 0 | 1 | 2> = { x: 0, y: 1, z: 2 }

/**
 * Everything the renderers need for one update.
 */
export interface SceneFrame {
  frustum: IndexedGeometry | null
  cube: IndexedGeometry
  plane: IndexedGeometry | null
  planeSurface: PlaneSurface | null
  projectedCube: ProjectedGeometry | null
  projectedPlane: ProjectedGeometry | null
  intrinsics: CameraIntrinsics
  convention: RotationConvention
  elevation: number
  azimuth: number
}

export interface SceneStoreOptions {
  intrinsics?: CameraIntrinsics
  defaults?: SceneDefaults
}

function clamp(value: number, range: readonly [number, number]): number {
  return Math.max(range[0], Math.min(range[1], value))
}

/**
 * Controller between the control surface and the renderers.
 *
 * Control actions validate and apply the new camera state, re-aim the camera
 * at the cube centre and rebuild `frame`. A rejected update keeps the last
 * valid camera and reports the reason through `error`.
 */
export class SceneStore {
  readonly camera: SceneCamera
  readonly cube: Cube
  readonly plane: Plane
  readonly intrinsics: CameraIntrinsics
  private readonly defaults: SceneDefaults

  cameraPosition: Vec3
  elevation: number
  azimuth: number
  planeVisible: boolean
  convention: RotationConvention
  error: string | null = null
  frame: SceneFrame

  constructor(options: SceneStoreOptions = {}) {
    const defaults = options.defaults ?? SCENE_DEFAULTS
    const intrinsics = options.intrinsics ?? DEFAULT_INTRINSICS
    validateIntrinsics(intrinsics)

    this.defaults = defaults
    this.intrinsics = { ...intrinsics }
    this.cube = Cube.create(defaults.cube.origin, defaults.cube.size)
    this.plane = Plane.create(defaults.plane)
    this.camera = SceneCamera.create(defaults.camera)
    this.camera.lookAt(this.cube.center)

    this.cameraPosition = defaults.camera.position
    this.elevation = defaults.view.elevation
    this.azimuth = defaults.view.azimuth
    this.planeVisible = defaults.plane.visible
    this.convention = defaults.convention
    this.frame = this.buildFrame()

    makeAutoObservable<SceneStore, 'defaults'>(this, {
      camera: false,
      cube: false,
      plane: false,
      intrinsics: false,
      defaults: false,
      frame: observable.ref,
      cameraPosition: observable.ref
    }, { autoBind: true })
  }

  get viewLimit(): number {
    return this.defaults.view.limit
  }

  get ranges(): SceneDefaults['ranges'] {
    return this.defaults.ranges
  }

  setCameraAxis(axis: CameraAxis, value: number) {
    const next: [number, number, number] = [...this.cameraPosition]
    next[AXIS_INDEX[axis]] = clamp(value, this.defaults.ranges.position)
    this.setCameraPosition(next)
  }

  setCameraPosition(position: Vec3) {
    const range = this.defaults.ranges.position
    const clamped: Vec3 = [clamp(position[0], range), clamp(position[1], range), clamp(position[2], range)]
    if (this.updateCamera(() => {
      this.camera.lookAt(this.cube.center, clamped)
    })) {
      this.cameraPosition = clamped
      logDebug(`Camera moved to ${vec3.toString(clamped)}`)
    }
  }

  setCameraSize(size: number) {
    this.updateCamera(() => this.camera.setSize(size))
  }

  setElevation(elevation: number) {
    this.elevation = clamp(elevation, this.defaults.ranges.elevation)
    this.updateCamera(() => this.camera.lookAt(this.cube.center))
  }

  setAzimuth(azimuth: number) {
    this.azimuth = clamp(azimuth, this.defaults.ranges.azimuth)
    this.updateCamera(() => this.camera.lookAt(this.cube.center))
  }

  setPlaneVisible(visible: boolean) {
    this.planeVisible = visible
    this.frame = this.buildFrame()
  }

  setConvention(convention: RotationConvention) {
    this.convention = convention
    this.frame = this.buildFrame()
  }

  reset() {
    const { camera, view, plane } = this.defaults
    this.elevation = view.elevation
    this.azimuth = view.azimuth
    this.planeVisible = plane.visible
    this.convention = this.defaults.convention
    this.setCameraSize(camera.size)
    this.setCameraPosition(camera.position)
    logInfo('Camera and view reset')
  }

  /**
   * Run a camera mutation. Geometry errors are recorded and logged, anything
   * else propagates. The frame is rebuilt either way.
   */
  private updateCamera(mutate: () => void): boolean {
    try {
      mutate()
      this.error = null
      return true
    } catch (error) {
      if (!isSceneGeometryError(error)) {
        throw error
      }
      this.error = error.message
      logRejection(error)
      return false
    } finally {
      this.frame = this.buildFrame()
    }
  }

  private buildFrame(): SceneFrame {
    const hasBasis = this.camera.basis !== null
    const options = { intrinsics: this.intrinsics, convention: this.convention }
    const cube = this.cube.geometry()
    const plane = this.planeVisible ? this.plane.geometry() : null

    const projectedCube = hasBasis ? projectGeometry(cube, this.camera, options) : null
    const projectedPlane = hasBasis && plane ? projectGeometry(plane, this.camera, options) : null

    const clampedCount = [...(projectedCube?.points ?? []), ...(projectedPlane?.points ?? [])]
      .filter(p => p.clamped).length
    if (clampedCount > 0) {
      warnOnce(`${clampedCount} point(s) at or behind the near plane were clamped to depth 0.1`)
    }

    return {
      frustum: this.camera.frustum(),
      cube,
      plane,
      planeSurface: plane ? this.plane.surface : null,
      projectedCube,
      projectedPlane,
      intrinsics: this.intrinsics,
      convention: this.convention,
      elevation: this.elevation,
      azimuth: this.azimuth
    }
  }
}
