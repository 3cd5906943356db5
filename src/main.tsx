import React from 'react'
import ReactDOM from 'react-dom/client'
import { configure } from 'mobx'
import { setVerboseLogging } from './logging/scene-logger'
import App from './App'

configure({
  enforceActions: 'never',
  computedRequiresReaction: false,
  reactionRequiresObservable: false,
  observableRequiresReaction: false,
  disableErrorBoundaries: false
})

if (__VERBOSE_LOGS__) {
  setVerboseLogging(true)
}

document.title = 'Camera Extrinsics Explorer'

const root = document.getElementById('root')
if (!root) {
  throw new Error('Missing #root element')
}

ReactDOM.createRoot(root).render(
  <React.StrictMode>
    <App />
  </React.StrictMode>
)
