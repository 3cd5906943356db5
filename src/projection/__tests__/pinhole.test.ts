import {
  NEAR_PLANE_DEPTH,
  buildExtrinsics,
  cameraExtrinsics,
  isInsideImage,
  projectGeometry,
  projectPoints,
  projectionMatrix,
  projectWithMatrix
} from '../pinhole'
import { DEFAULT_INTRINSICS, intrinsicsMatrix, validateIntrinsics } from '../intrinsics'
import { SceneCamera } from '../../entities/camera/SceneCamera'
import { Cube } from '../../entities/cube/Cube'
import { SceneGeometryError } from '../../errors'
import { determinant3 } from '../../utils/transform'
import type { Vec3 } from '../../utils/vec3'

const CUBE_CENTER: Vec3 = [0.5, 0.5, 0.5]

function defaultCamera(): SceneCamera {
  const camera = SceneCamera.create({ position: [2, -4, 2], upHint: [0, 0, 1], size: 0.3 })
  camera.lookAt(CUBE_CENTER)
  return camera
}

describe('intrinsics', () => {
  it('builds K from focal lengths and principal point', () => {
    expect(intrinsicsMatrix(DEFAULT_INTRINSICS)).toEqual([
      [800, 0, 320],
      [0, 800, 240],
      [0, 0, 1]
    ])
  })

  it('rejects non-positive focal lengths and image sizes', () => {
    expect(() => validateIntrinsics({ ...DEFAULT_INTRINSICS, fx: 0 })).toThrow('InvalidArgument')
    expect(() => validateIntrinsics({ ...DEFAULT_INTRINSICS, height: -480 })).toThrow('InvalidArgument')
    expect(() => validateIntrinsics({ ...DEFAULT_INTRINSICS, cx: NaN })).toThrow('InvalidArgument')
  })
})

describe('buildExtrinsics', () => {
  it('uses rows [right, -up, direction] for the look-at layout', () => {
    const camera = SceneCamera.create({ position: [0, -5, 0] })
    camera.lookAt([0, 0, 0])
    const { rotation, translation } = cameraExtrinsics(camera)

    rotation.forEach((row, i) => {
      const expected = [[1, 0, 0], [0, 0, -1], [0, 1, 0]][i]
      row.forEach((value, j) => expect(value).toBeCloseTo(expected[j], 12))
    })
    expect(determinant3(rotation)).toBeCloseTo(1, 12)
    expect(translation[2]).toBeCloseTo(5, 12)
  })

  it('uses columns [right, up x right, up] for the legacy layout', () => {
    // Looking along +Y with Z up, those columns are exactly the identity
    const camera = SceneCamera.create({ position: [0, -5, 0] })
    camera.lookAt([0, 0, 0])
    const { rotation, translation } = cameraExtrinsics(camera, 'legacy')

    rotation.forEach((row, i) => {
      row.forEach((value, j) => expect(value).toBeCloseTo(i === j ? 1 : 0, 12))
    })
    translation.forEach((value, i) => expect(value).toBeCloseTo([0, 5, 0][i], 12))
  })

  it('places the camera centre at the camera-space origin', () => {
    const camera = defaultCamera()
    const basis = camera.basis
    expect(basis).not.toBeNull()
    if (!basis) return

    for (const convention of ['look-at', 'legacy'] as const) {
      const { rotation, translation } = buildExtrinsics(basis, camera.position, convention)
      const centre = rotation.map((row, i) =>
        row[0] * camera.position[0] + row[1] * camera.position[1] + row[2] * camera.position[2] + translation[i]
      )
      expect(centre).toEqual([0, 0, 0])
    }
  })

  it('requires an oriented camera', () => {
    const camera = SceneCamera.create()
    expect(() => cameraExtrinsics(camera)).toThrow(SceneGeometryError)
    expect(() => projectPoints([[0, 0, 0]], camera)).toThrow('InvalidArgument')
  })
})

describe('projectPoints', () => {
  it('projects a simple point by hand', () => {
    const camera = SceneCamera.create({ position: [0, -5, 0] })
    camera.lookAt([0, 0, 0])
    const [point] = projectPoints([[1, 0, 1]], camera)

    // camera space (1, -1, 5): x = 0.2, y = -0.2
    expect(point.index).toBe(0)
    expect(point.u).toBeCloseTo(480, 9)
    expect(point.v).toBeCloseTo(80, 9)
    expect(point.depth).toBeCloseTo(5, 12)
    expect(point.clamped).toBe(false)
  })

  it('puts the look-at target on the principal point', () => {
    const [point] = projectPoints([CUBE_CENTER], defaultCamera())
    expect(point.u).toBeCloseTo(320, 9)
    expect(point.v).toBeCloseTo(240, 9)
    expect(point.depth).toBeCloseTo(Math.sqrt(24.75), 12)
  })

  it('clamps the camera centre to the near plane instead of failing', () => {
    for (const convention of ['look-at', 'legacy'] as const) {
      const [point] = projectPoints([[2, -4, 2]], defaultCamera(), { convention })
      expect(point).toEqual({ index: 0, u: 320, v: 240, depth: 0, clamped: true })
      expect(isInsideImage(point)).toBe(true)
    }
  })

  it('divides by the near plane for points behind the camera', () => {
    const camera = SceneCamera.create({ position: [0, -5, 0] })
    camera.lookAt([0, 0, 0])
    const [point] = projectPoints([[1, -7, 0]], camera)

    // camera space (1, 0, -2) is clamped to depth 0.1
    expect(point.clamped).toBe(true)
    expect(point.depth).toBeCloseTo(-2, 12)
    expect(point.u).toBeCloseTo(320 + 800 * 1 / NEAR_PLANE_DEPTH, 6)
    expect(point.v).toBeCloseTo(240, 9)
  })

  it('honours custom intrinsics and near plane', () => {
    const camera = SceneCamera.create({ position: [0, -5, 0] })
    camera.lookAt([0, 0, 0])
    const intrinsics = { fx: 400, fy: 200, cx: 100, cy: 50, width: 200, height: 100 }

    const [ahead, behind] = projectPoints([[1, 0, 1], [0, -4.5, 0]], camera, { intrinsics, nearPlane: 1 })
    expect(ahead.u).toBeCloseTo(180, 9)
    expect(ahead.v).toBeCloseTo(10, 9)
    expect(behind.clamped).toBe(true)
    expect(behind.depth).toBeCloseTo(0.5, 12)

    expect(() => projectPoints([[0, 0, 0]], camera, { nearPlane: 0 })).toThrow('InvalidArgument')
    expect(() => projectPoints([[0, 0, 0]], camera, { intrinsics: { ...intrinsics, fy: -1 } })).toThrow('InvalidArgument')
  })

  describe('default scene', () => {
    const expected: Array<[number, number, number]> = [
      [215.11911518298484, 334.8683298050514, 4.824181513244218],
      [375.9364719024081, 358.0583659796195, 4.522670168666455],
      [275.83962744546733, 279.94455991791637, 5.728715546977509],
      [413.2274531706802, 296.2182695141045, 5.4272042023997455],
      [208.12705619518385, 172.5380765830746, 4.522670168666455],
      [379.9319341811515, 185.78952582568493, 4.221158824088691],
      [273.38627341465997, 141.6180283503171, 5.4272042023997455],
      [418.7114210042496, 150.71216018348105, 5.125692857821981]
    ]

    it('projects all 8 cube vertices inside the image around its centre', () => {
      const points = projectPoints(Cube.create().vertices, defaultCamera())

      expect(points).toHaveLength(8)
      points.forEach((point, i) => {
        const [u, v, depth] = expected[i]
        expect(point.index).toBe(i)
        expect(point.u).toBeCloseTo(u, 6)
        expect(point.v).toBeCloseTo(v, 6)
        expect(point.depth).toBeCloseTo(depth, 9)
        expect(point.clamped).toBe(false)
        expect(isInsideImage(point)).toBe(true)
        expect(Math.abs(point.u - 320)).toBeLessThan(120)
        expect(Math.abs(point.v - 240)).toBeLessThan(120)
      })
    })

    it('reproduces the legacy layout, which puts the cube behind the camera', () => {
      const points = projectPoints(Cube.create().vertices, defaultCamera(), { convention: 'legacy' })

      expect(points.every(p => p.clamped)).toBe(true)
      expect(points.every(p => Number.isFinite(p.u) && Number.isFinite(p.v))).toBe(true)
      expect(points[0].u).toBeCloseTo(-22981.755652503707, 4)
      expect(points[0].v).toBeCloseTo(19548.824394817057, 4)
      expect(points[0].depth).toBeCloseTo(-3.1129705568022388, 9)
      expect(points[7].u).toBeCloseTo(-18567.150096118177, 4)
      expect(points[7].v).toBeCloseTo(31603.22900700751, 4)
    })
  })
})

describe('projectGeometry', () => {
  it('keeps edges as index pairs into the projected points', () => {
    const cube = Cube.create()
    const projected = projectGeometry(cube.geometry(), defaultCamera())

    expect(projected.edges).toBe(cube.edges)
    expect(projected.points.map(p => p.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7])
    const [start, end] = projected.edges[0]
    expect(projected.points[start].u).toBeCloseTo(215.11911518298484, 6)
    expect(projected.points[end].u).toBeCloseTo(375.9364719024081, 6)
  })
})

describe('projection matrix', () => {
  it('agrees with the clamped pipeline for points in front of the camera', () => {
    const camera = defaultCamera()
    const P = projectionMatrix(intrinsicsMatrix(DEFAULT_INTRINSICS), cameraExtrinsics(camera))
    expect(P).toHaveLength(3)
    P.forEach(row => expect(row).toHaveLength(4))

    const vertices = Cube.create().vertices
    const points = projectPoints(vertices, camera)
    vertices.forEach((vertex, i) => {
      const [u, v] = projectWithMatrix(P, vertex)
      expect(u).toBeCloseTo(points[i].u, 6)
      expect(v).toBeCloseTo(points[i].v, 6)
    })
  })

  it('has no image for points on the camera plane', () => {
    const camera = defaultCamera()
    const P = projectionMatrix(intrinsicsMatrix(DEFAULT_INTRINSICS), cameraExtrinsics(camera))
    expect(() => projectWithMatrix(P, camera.position)).toThrow(SceneGeometryError)
  })
})

describe('isInsideImage', () => {
  it('treats the right and bottom borders as outside', () => {
    expect(isInsideImage({ u: 0, v: 0 })).toBe(true)
    expect(isInsideImage({ u: 639.9, v: 479.9 })).toBe(true)
    expect(isInsideImage({ u: 640, v: 10 })).toBe(false)
    expect(isInsideImage({ u: 10, v: 480 })).toBe(false)
    expect(isInsideImage({ u: -0.1, v: 10 })).toBe(false)
  })
})
