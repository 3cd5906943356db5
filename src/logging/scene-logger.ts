// Scene activity log. Entries are structured so the UI can show what the camera
// did and why an update was refused; the console only ever sees the message text.

import type { SceneGeometryError, SceneGeometryErrorKind } from '../errors'

export type SceneLogLevel = 'debug' | 'info' | 'warn'

export interface SceneLogEntry {
  /** Increases by one per new entry; a repeated message keeps its seq. */
  seq: number
  level: SceneLogLevel
  message: string
  /** Set on rejected updates. */
  kind?: SceneGeometryErrorKind
  /** How many times in a row this exact message was logged. */
  count: number
}

export type SceneLogListener = (entry: SceneLogEntry) => void

export const SCENE_LOG_CAPACITY = 200

const entries: SceneLogEntry[] = []
const listeners = new Set<SceneLogListener>()
const warnedOnce = new Set<string>()
let nextSeq = 1
let verbose = false

// No `process` in the browser build
const env: Record<string, string | undefined> = typeof process !== 'undefined' ? process.env : {}
const echoToConsole = env.NODE_ENV !== 'test' || env.CAMERA_EXPLORER_VERBOSE_TESTS === 'true'

function record(level: SceneLogLevel, message: string, kind?: SceneGeometryErrorKind): SceneLogEntry {
  const last = entries[entries.length - 1]
  let entry: SceneLogEntry
  if (last && last.level === level && last.message === message && last.kind === kind) {
    // Slider drags repeat the same rejection many times; fold them together
    entry = { ...last, count: last.count + 1 }
    entries[entries.length - 1] = entry
  } else {
    entry = { seq: nextSeq++, level, message, kind, count: 1 }
    entries.push(entry)
    if (entries.length > SCENE_LOG_CAPACITY) {
      entries.splice(0, entries.length - SCENE_LOG_CAPACITY)
    }
    if (echoToConsole) {
      const line = `[Scene] ${message}`
      if (level === 'warn') console.warn(line)
      else console.log(line)
    }
  }

  listeners.forEach(listener => listener(entry))
  return entry
}

export function setVerboseLogging(enabled: boolean) {
  verbose = enabled
}

export function logInfo(message: string) {
  record('info', message)
}

/** Dropped unless verbose logging is on. */
export function logDebug(message: string) {
  if (verbose) record('debug', message)
}

export function logRejection(error: SceneGeometryError) {
  record('warn', `Rejected camera update: ${error.message}`, error.kind)
}

/**
 * Warn once per distinct message until the log is cleared.
 */
export function warnOnce(message: string) {
  if (warnedOnce.has(message)) return
  warnedOnce.add(message)
  record('warn', message)
}

export function getSceneLog(): readonly SceneLogEntry[] {
  return entries
}

export function subscribeSceneLog(listener: SceneLogListener): () => void {
  listeners.add(listener)
  return () => {
    listeners.delete(listener)
  }
}

export function clearSceneLog() {
  entries.length = 0
  warnedOnce.clear()
}
