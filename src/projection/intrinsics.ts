import type { Mat3 } from '../utils/transform'
import { invalidArgument } from '../errors'

/**
 * Pinhole intrinsics plus the image size they are meant for.
 */
export interface CameraIntrinsics {
  fx: number
  fy: number
  cx: number
  cy: number
  width: number
  height: number
}

export const DEFAULT_INTRINSICS: Readonly<CameraIntrinsics> = {
  fx: 800,
  fy: 800,
  cx: 320,
  cy: 240,
  width: 640,
  height: 480
}

export function validateIntrinsics(intrinsics: CameraIntrinsics): void {
  const { fx, fy, cx, cy, width, height } = intrinsics
  if (![fx, fy, cx, cy, width, height].every(Number.isFinite)) {
    throw invalidArgument('intrinsics must be finite numbers')
  }
  if (fx <= 0 || fy <= 0) {
    throw invalidArgument(`focal lengths must be positive, got fx=${fx}, fy=${fy}`)
  }
  if (width <= 0 || height <= 0) {
    throw invalidArgument(`image size must be positive, got ${width}x${height}`)
  }
}

/** K = [[fx, 0, cx], [0, fy, cy], [0, 0, 1]] */
export function intrinsicsMatrix(intrinsics: CameraIntrinsics): Mat3 {
  return [
    [intrinsics.fx, 0, intrinsics.cx],
    [0, intrinsics.fy, intrinsics.cy],
    [0, 0, 1]
  ]
}
