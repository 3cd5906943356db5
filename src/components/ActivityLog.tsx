import React, { useEffect, useState } from 'react'
import { FontAwesomeIcon } from '@fortawesome/react-fontawesome'
import { faBug, faCircleInfo, faTriangleExclamation } from '@fortawesome/free-solid-svg-icons'
import type { IconDefinition } from '@fortawesome/fontawesome-svg-core'
import { getSceneLog, subscribeSceneLog } from '../logging/scene-logger'
import type { SceneLogEntry, SceneLogLevel } from '../logging/scene-logger'

interface ActivityLogProps {
  limit?: number
}

const LEVEL_ICONS: Record<SceneLogLevel, { icon: IconDefinition; color: string }> = {
  debug: { icon: faBug, color: '#9E9E9E' },
  info: { icon: faCircleInfo, color: '#1E88E5' },
  warn: { icon: faTriangleExclamation, color: '#FFC107' }
}

function latest(limit: number): SceneLogEntry[] {
  return getSceneLog().slice(-limit).reverse()
}

/**
 * Most recent scene log entries, newest first.
 */
export const ActivityLog: React.FC<ActivityLogProps> = ({ limit = 5 }) => {
  const [entries, setEntries] = useState(() => latest(limit))

  useEffect(() => {
    setEntries(latest(limit))
    return subscribeSceneLog(() => setEntries(latest(limit)))
  }, [limit])

  return (
    <div className="activity-log">
      <h4>Activity</h4>
      {entries.length === 0 ? (
        <div className="activity-log__empty">No activity yet</div>
      ) : (
        <ul aria-label="Scene activity">
          {entries.map(entry => (
            <li key={entry.seq} className={`activity-log__entry activity-log__entry--${entry.level}`}>
              <FontAwesomeIcon
                icon={LEVEL_ICONS[entry.level].icon}
                style={{ color: LEVEL_ICONS[entry.level].color, marginRight: 6 }}
              />
              {entry.kind && <strong className="activity-log__kind">{entry.kind}</strong>}
              <span className="activity-log__message">{entry.message}</span>
              {entry.count > 1 && <span className="activity-log__count"> ×{entry.count}</span>}
            </li>
          ))}
        </ul>
      )}
    </div>
  )
}
