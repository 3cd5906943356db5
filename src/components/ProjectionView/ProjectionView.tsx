// Camera view: the cube (and plane) as seen through the pinhole camera
import React, { useRef, useEffect } from 'react'
import { observer } from 'mobx-react-lite'
import type { SceneStore } from '../../store/scene-store'
import { imageToCanvas, renderImageFrame, renderProjected } from './imageRenderer'

interface ProjectionViewProps {
  store: SceneStore
  width?: number
  height?: number
}

export const ProjectionView: React.FC<ProjectionViewProps> = observer(({ store, width = 640, height = 480 }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null)
  const { frame } = store

  useEffect(() => {
    const canvas = canvasRef.current
    const ctx = canvas?.getContext('2d')
    if (!canvas || !ctx) return

    const toCanvas = imageToCanvas(frame.intrinsics, canvas.width, canvas.height)

    ctx.clearRect(0, 0, canvas.width, canvas.height)
    ctx.fillStyle = '#eeeeee'
    ctx.fillRect(0, 0, canvas.width, canvas.height)

    renderImageFrame(ctx, frame.intrinsics, toCanvas)
    renderProjected(ctx, frame.projectedPlane, toCanvas, { edge: '#FBC02D' })
    renderProjected(ctx, frame.projectedCube, toCanvas, { edge: '#E53935', point: '#1E88E5' })
  }, [frame])

  const clampedCount = frame.projectedCube?.points.filter(p => p.clamped).length ?? 0

  return (
    <div className="projection-view">
      <h3>Camera View (2D Projection)</h3>
      <canvas ref={canvasRef} width={width} height={height} data-testid="projection-canvas" />
      {clampedCount > 0 && (
        <div className="projection-view__note">
          {clampedCount} cube vertex{clampedCount === 1 ? '' : 'es'} behind the near plane (drawn dashed)
        </div>
      )}
    </div>
  )
})
