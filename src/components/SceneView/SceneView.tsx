// 3D scene view: orthographic canvas of the cube, camera frustum and plane
import React, { useRef, useEffect } from 'react'
import { observer } from 'mobx-react-lite'
import type { SceneStore } from '../../store/scene-store'
import { createOrbitProjector } from './orbitProjection'
import { renderAxes } from './renderers/axesRenderer'
import { renderCube, renderFrustum, renderPlane } from './renderers/sceneRenderers'

interface SceneViewProps {
  store: SceneStore
  width?: number
  height?: number
}

export const SceneView: React.FC<SceneViewProps> = observer(({ store, width = 560, height = 480 }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const { frame, viewLimit } = store

  useEffect(() => {
    const canvas = canvasRef.current
    const ctx = canvas?.getContext('2d')
    if (!canvas || !ctx) return

    const project3DTo2D = createOrbitProjector({
      elevation: frame.elevation,
      azimuth: frame.azimuth,
      width: canvas.width,
      height: canvas.height,
      limit: viewLimit
    })

    ctx.clearRect(0, 0, canvas.width, canvas.height)
    ctx.fillStyle = '#f5f5f5'
    ctx.fillRect(0, 0, canvas.width, canvas.height)

    // Back to front: axes, plane, cube, camera
    renderAxes(ctx, project3DTo2D)
    renderPlane(ctx, frame.plane, project3DTo2D)
    renderCube(ctx, frame.cube, project3DTo2D)
    renderFrustum(ctx, frame.frustum, project3DTo2D)
  }, [frame, viewLimit])

  return (
    <div className="scene-view">
      <h3>3D Scene</h3>
      <canvas ref={canvasRef} width={width} height={height} data-testid="scene-canvas" />
    </div>
  )
})
