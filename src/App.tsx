import { useState } from 'react'
import { SceneStore } from './store/scene-store'
import { SceneView } from './components/SceneView/SceneView'
import { ProjectionView } from './components/ProjectionView/ProjectionView'
import { ControlPanel } from './components/ControlPanel'
import { ActivityLog } from './components/ActivityLog'

function App() {
  const [store] = useState(() => new SceneStore())

  return (
    <div className="app" style={{ display: 'flex', flexDirection: 'column', gap: 12, padding: 12 }}>
      <div style={{ display: 'flex', gap: 12 }}>
        <SceneView store={store} />
        <ProjectionView store={store} />
      </div>
      <ControlPanel store={store} />
      <ActivityLog />
    </div>
  )
}

export default App
