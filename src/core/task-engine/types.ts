import type { TaskStatus } from '../db/types'
import type { TaskErrorCode } from '../errors'

export type LogStage = 'submission' | 'polling' | 'audio' | 'cleanup' | 'recovery'

export type LogLevel = 'info' | 'warn' | 'error'

/**
 * TaskEngine event definitions.
 */
export interface TaskEngineEvents {
  status: {
    taskId: string
    status: TaskStatus
    timestamp: string
  }
  progress: {
    taskId: string
    message: string
  }
  completed: {
    taskId: string
    audioRequested: boolean
  }
  failed: {
    taskId: string
    stage: 'submission' | 'remote'
    errorCode: TaskErrorCode
    errorMessage: string
  }
  audio: {
    taskId: string
    action: 'fetched' | 'fetchFailed' | 'deleted' | 'remoteCleaned'
    path?: string
    message?: string
  }
  log: {
    taskId: string | null
    stage: LogStage
    level: LogLevel
    text: string
    timestamp: string
  }
}

export type EventName = keyof TaskEngineEvents

export type Listener<T extends EventName> = (payload: TaskEngineEvents[T]) => void

export interface CreateTaskInput {
  sourceUrl: string
  keepAudio: boolean
  /** Plaintext handed to the secret provider before submission; never persisted. */
  secretPayload?: string
}

export type AudioFetchResult =
  | { fetched: true; path: string }
  | { fetched: false; errorMessage: string }

export interface DeleteAudioOptions {
  local?: boolean
  remote?: boolean
}

export interface ExportSubtitlesOptions {
  format?: 'srt' | 'txt'
  minLength?: number
  outputPath?: string
}

export interface ExportSubtitlesResult {
  path: string
  cueCount: number
  minLength: number
}
