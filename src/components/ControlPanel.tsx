import React from 'react'
import { observer } from 'mobx-react-lite'
import { FontAwesomeIcon } from '@fortawesome/react-fontawesome'
import { faRotateLeft, faTriangleExclamation } from '@fortawesome/free-solid-svg-icons'
import type { CameraAxis, SceneStore } from '../store/scene-store'

interface ControlPanelProps {
  store: SceneStore
}

interface SliderProps {
  id: string
  label: string
  value: number
  min: number
  max: number
  step: number
  onChange: (value: number) => void
}

const Slider: React.FC<SliderProps> = ({ id, label, value, min, max, step, onChange }) => (
  <div className="control-panel__slider">
    <label htmlFor={id}>{label}</label>
    <input
      id={id}
      type="range"
      min={min}
      max={max}
      step={step}
      value={value}
      onChange={(e) => onChange(parseFloat(e.target.value))}
    />
    <span className="control-panel__value">{value.toFixed(1)}</span>
  </div>
)

const AXES: CameraAxis[] = ['x', 'y', 'z']

export const ControlPanel: React.FC<ControlPanelProps> = observer(({ store }) => {
  const { ranges } = store

  return (
    <div className="control-panel">
      <div className="control-panel__group">
        {AXES.map((axis, i) => (
          <Slider
            key={axis}
            id={`camera-${axis}`}
            label={`Camera ${axis.toUpperCase()}`}
            value={store.cameraPosition[i]}
            min={ranges.position[0]}
            max={ranges.position[1]}
            step={0.1}
            onChange={(value) => store.setCameraAxis(axis, value)}
          />
        ))}
      </div>

      <div className="control-panel__group">
        <Slider
          id="view-elevation"
          label="Elevation"
          value={store.elevation}
          min={ranges.elevation[0]}
          max={ranges.elevation[1]}
          step={1}
          onChange={store.setElevation}
        />
        <Slider
          id="view-azimuth"
          label="Azimuth"
          value={store.azimuth}
          min={ranges.azimuth[0]}
          max={ranges.azimuth[1]}
          step={1}
          onChange={store.setAzimuth}
        />
      </div>

      <div className="control-panel__group">
        <label>
          <input
            type="checkbox"
            checked={store.planeVisible}
            onChange={(e) => store.setPlaneVisible(e.target.checked)}
          />
          Show plane
        </label>
        <label>
          <input
            type="checkbox"
            checked={store.convention === 'legacy'}
            onChange={(e) => store.setConvention(e.target.checked ? 'legacy' : 'look-at')}
          />
          Legacy rotation layout
        </label>
        <button type="button" onClick={store.reset} title="Reset camera and view">
          <FontAwesomeIcon icon={faRotateLeft} /> Reset
        </button>
      </div>

      {store.error && (
        <div className="control-panel__error" role="alert">
          <FontAwesomeIcon icon={faTriangleExclamation} style={{ color: '#FFC107', marginRight: 6 }} />
          {store.error}
        </div>
      )}
    </div>
  )
})
