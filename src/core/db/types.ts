export type TaskStatus = 'created' | 'submitted' | 'processing' | 'completed' | 'failed'

export type TerminalTaskStatus = Extract<TaskStatus, 'completed' | 'failed'>

/** `[startMs, endMs]` for one content character of the transcript. */
export type TimestampPair = [number, number]

export interface TaskRecord {
  id: string
  sourceUrl: string
  status: TaskStatus
  progress: string | null
  keepAudio: boolean
  transcript: string | null
  subtitleSource: TimestampPair[] | null
  audioRef: string | null
  audioLocalPath: string | null
  audioFetchError: string | null
  title: string | null
  uploader: string | null
  errorMessage: string | null
  createdAt: string
  updatedAt: string
  completedAt: string | null
}

export interface AppSettings {
  remoteBaseUrl: string
  pollIntervalMs: number
  requestTimeoutMs: number
  /** Bound on a single audio download. */
  audioTimeoutMs: number
  /** When null, subtitle export picks a length from the transcript language. */
  defaultMinLength: number | null
  historyLimit: number
  localRetentionDays: number
}

/** A completed task whose kept audio has not reached local disk yet. */
export function awaitsAudioFetch(task: TaskRecord): boolean {
  return task.status === 'completed' && task.keepAudio && task.audioRef !== null && task.audioLocalPath === null
}

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return status === 'completed' || status === 'failed'
}
