// Errors raised by the camera model, geometry primitives and projection pipeline.
// All of them are precondition failures: they are thrown before any state is written.

export type SceneGeometryErrorKind = 'DegenerateDirection' | 'DegenerateBasis' | 'InvalidArgument'

export class SceneGeometryError extends Error {
  readonly kind: SceneGeometryErrorKind

  constructor(kind: SceneGeometryErrorKind, message: string) {
    super(`${kind}: ${message}`)
    this.name = 'SceneGeometryError'
    this.kind = kind
    Object.setPrototypeOf(this, SceneGeometryError.prototype)
  }
}

export function isSceneGeometryError(error: unknown): error is SceneGeometryError {
  return error instanceof SceneGeometryError
}

export function invalidArgument(message: string): SceneGeometryError {
  return new SceneGeometryError('InvalidArgument', message)
}
