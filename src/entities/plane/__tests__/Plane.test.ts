import { Plane, linspace } from '../Plane'
import { SceneGeometryError } from '../../../errors'
import type { Vec3 } from '../../../utils/vec3'

function expectVecClose(actual: Vec3, expected: Vec3, digits = 10) {
  expected.forEach((value, i) => expect(actual[i]).toBeCloseTo(value, digits))
}

describe('linspace', () => {
  it('includes both endpoints', () => {
    expect(linspace(0, 1, 3)).toEqual([0, 0.5, 1])
    expect(linspace(-2, 2, 5)).toEqual([-2, -1, 0, 1, 2])
    const samples = linspace(-5, 5, 10)
    expect(samples).toHaveLength(10)
    expect(samples[0]).toBe(-5)
    expect(samples[9]).toBe(5)
  })
})

describe('Plane', () => {
  it('uses a 10 x 10 grid of half-extent 5 by default', () => {
    const plane = Plane.create()
    expect(plane.resolution).toBe(10)
    expect(plane.scale).toBe(5)
    expect(plane.surface.x).toHaveLength(10)
    expect(plane.surface.x[0]).toHaveLength(10)
    expect(plane.vertices).toHaveLength(100)
  })

  it('spans [c - s, c + s] in X and Y at z = c.z without rotation', () => {
    const plane = Plane.create({ center: [1, 2, 3], scale: 2, resolution: 5 })
    const { x, y, z } = plane.surface

    for (let row = 0; row < 5; row++) {
      expect(x[row]).toEqual([-1, 0, 1, 2, 3])
      expect(y[row]).toEqual([row, row, row, row, row])
      expect(z[row]).toEqual([3, 3, 3, 3, 3])
    }
  })

  it('rotates about X before translating', () => {
    const plane = Plane.create({ rotation: [90, 0, 0], scale: 1, resolution: 2 })
    const [v0, v1, v2, v3] = plane.vertices

    expectVecClose(v0, [-1, 0, -1])
    expectVecClose(v1, [1, 0, -1])
    expectVecClose(v2, [-1, 0, 1])
    expectVecClose(v3, [1, 0, 1])
  })

  it('applies Z rotation and then the centre offset', () => {
    const plane = Plane.create({ center: [10, 0, 0], rotation: [0, 0, 90], scale: 1, resolution: 2 })
    expectVecClose(plane.vertices[0], [11, -1, 0])
    expect(plane.transform[3]).toEqual([0, 0, 0, 1])
  })

  it('connects grid neighbours', () => {
    const plane = Plane.create({ resolution: 3 })
    expect(plane.edges).toHaveLength(12)
    expect(plane.edges).toContainEqual([0, 1])
    expect(plane.edges).toContainEqual([0, 3])
    expect(plane.edges).not.toContainEqual([0, 4])
  })

  it('recomputes the surface on every setter', () => {
    const plane = Plane.create({ scale: 1, resolution: 2 })

    plane.setCenter([0, 0, 4])
    expect(plane.surface.z).toEqual([[4, 4], [4, 4]])

    plane.setRotation([0, 90, 0])
    // Y by 90 maps local +X to world -Z
    expectVecClose(plane.vertices[1], [0, -1, 3])

    plane.setRotation([0, 0, 0])
    plane.setScale(3)
    expect(plane.surface.x[0]).toEqual([-3, 3])

    plane.setResolution(4)
    expect(plane.vertices).toHaveLength(16)
    expect(plane.edges).toHaveLength(24)
  })

  it('collapses a resolution of 1 to a single corner point with no edges', () => {
    const plane = Plane.create({ center: [1, 2, 3], scale: 2, resolution: 1 })
    expect(plane.vertices).toEqual([[-1, 0, 3]])
    expect(plane.edges).toEqual([])
    expect(plane.surface.x).toEqual([[-1]])
  })

  it('rejects invalid scale and resolution', () => {
    expect(() => Plane.create({ scale: 0 })).toThrow(SceneGeometryError)
    expect(() => Plane.create({ resolution: 0 })).toThrow('InvalidArgument')
    expect(() => Plane.create({ resolution: 2.5 })).toThrow('InvalidArgument')

    const plane = Plane.create({ scale: 1, resolution: 2 })
    expect(() => plane.setScale(-1)).toThrow('InvalidArgument')
    expect(() => plane.setResolution(0)).toThrow('InvalidArgument')
    expect(plane.scale).toBe(1)
    expect(plane.resolution).toBe(2)
  })
})
