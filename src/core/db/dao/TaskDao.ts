import type Database from 'better-sqlite3'
import { StoreError, errorMessage } from '../../errors'
import { isTerminalStatus, type TaskRecord, type TaskStatus, type TimestampPair } from '../types'

export const MAX_RECENT_TASKS = 100

interface TaskRow {
  id: string
  sourceUrl: string
  status: TaskStatus
  progress: string | null
  keepAudio: number
  transcript: string | null
  subtitleSource: string | null
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

const SELECT_COLUMNS = `
  id,
  source_url AS sourceUrl,
  status,
  progress,
  keep_audio AS keepAudio,
  transcript,
  subtitle_source AS subtitleSource,
  audio_ref AS audioRef,
  audio_local_path AS audioLocalPath,
  audio_fetch_error AS audioFetchError,
  title,
  uploader,
  error_message AS errorMessage,
  created_at AS createdAt,
  updated_at AS updatedAt,
  completed_at AS completedAt
`

const STATUS_RANK: Record<TaskStatus, number> = {
  created: 0,
  submitted: 1,
  processing: 2,
  completed: 3,
  failed: 3,
}

function isTimestampPair(value: unknown): value is TimestampPair {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  )
}

function parseSubtitleSource(taskId: string, raw: string | null): TimestampPair[] | null {
  if (raw === null) return null
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (error) {
    throw new StoreError(`Corrupt subtitle source for task ${taskId}`, { cause: error })
  }
  if (!Array.isArray(parsed) || !parsed.every(isTimestampPair)) {
    throw new StoreError(`Corrupt subtitle source for task ${taskId}`)
  }
  return parsed
}

function mapTask(row: TaskRow): TaskRecord {
  return {
    id: row.id,
    sourceUrl: row.sourceUrl,
    status: row.status,
    progress: row.progress,
    keepAudio: row.keepAudio === 1,
    transcript: row.transcript,
    subtitleSource: parseSubtitleSource(row.id, row.subtitleSource),
    audioRef: row.audioRef,
    audioLocalPath: row.audioLocalPath,
    audioFetchError: row.audioFetchError,
    title: row.title,
    uploader: row.uploader,
    errorMessage: row.errorMessage,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    completedAt: row.completedAt,
  }
}

function sanitizeLimit(limit?: number): number {
  if (limit === undefined || !Number.isFinite(limit)) return MAX_RECENT_TASKS
  return Math.min(MAX_RECENT_TASKS, Math.max(1, Math.floor(limit)))
}

function assertRecordShape(task: TaskRecord): void {
  const hasTranscript = task.transcript !== null
  const hasTimestamps = task.subtitleSource !== null
  if (hasTranscript !== hasTimestamps) {
    throw new StoreError(`Task ${task.id} must carry transcript and subtitle source together`, {
      code: 'E_INVARIANT',
    })
  }
  if (task.status === 'completed' && !hasTranscript) {
    throw new StoreError(`Completed task ${task.id} is missing its transcript`, { code: 'E_INVARIANT' })
  }
  if (task.status !== 'completed' && hasTranscript) {
    throw new StoreError(`Task ${task.id} has a transcript but status is ${task.status}`, {
      code: 'E_INVARIANT',
    })
  }
  if (task.audioLocalPath !== null && !(task.keepAudio && task.status === 'completed')) {
    throw new StoreError(`Task ${task.id} cannot hold a local audio path`, { code: 'E_INVARIANT' })
  }
  if (task.errorMessage !== null && task.status !== 'failed') {
    throw new StoreError(`Task ${task.id} has an error message but status is ${task.status}`, {
      code: 'E_INVARIANT',
    })
  }
}

function assertTransition(taskId: string, from: TaskStatus, to: TaskStatus): void {
  if (from === to) return
  if (isTerminalStatus(from) || STATUS_RANK[to] < STATUS_RANK[from]) {
    throw new StoreError(`Task ${taskId} cannot move from ${from} to ${to}`, { code: 'E_INVARIANT' })
  }
}

/**
 * Durable task table. Every write runs in its own transaction on a single
 * connection, so readers only ever observe whole records.
 */
export class TaskDao {
  constructor(private readonly db: Database.Database) {}

  upsert(task: TaskRecord): TaskRecord {
    return this.guard('upsert', () => this.db.transaction(() => this.writeTask(task))())
  }

  /** Replace the record stored under `fromId` with `task`, which may carry a new id. */
  rekey(fromId: string, task: TaskRecord): TaskRecord {
    return this.guard('rekey', () =>
      this.db.transaction(() => {
        const previous = this.findRow(fromId)
        if (!previous) {
          throw new StoreError(`Task not found: ${fromId}`, { code: 'E_TASK_NOT_FOUND' })
        }
        if (fromId !== task.id) {
          if (this.findRow(task.id)) {
            throw new StoreError(`Task ${task.id} already exists`, { code: 'E_INVARIANT' })
          }
          assertTransition(task.id, previous.status, task.status)
          this.db.prepare('DELETE FROM tasks WHERE id = ?').run(fromId)
        }
        return this.writeTask(task)
      })(),
    )
  }

  get(taskId: string): TaskRecord | null {
    return this.guard('get', () => {
      const row = this.findRow(taskId)
      return row ? mapTask(row) : null
    })
  }

  getTaskById(taskId: string): TaskRecord {
    const task = this.get(taskId)
    if (!task) {
      throw new StoreError(`Task not found: ${taskId}`, { code: 'E_TASK_NOT_FOUND' })
    }
    return task
  }

  listRecent(limit = MAX_RECENT_TASKS): TaskRecord[] {
    return this.guard('listRecent', () => {
      const rows = this.db
        .prepare(`SELECT ${SELECT_COLUMNS} FROM tasks ORDER BY created_at DESC, rowid DESC LIMIT ?`)
        .all(sanitizeLimit(limit)) as TaskRow[]
      return rows.map(mapTask)
    })
  }

  listByStatus(statuses: TaskStatus[]): TaskRecord[] {
    if (statuses.length === 0) return []
    return this.guard('listByStatus', () => {
      const placeholders = statuses.map(() => '?').join(', ')
      const rows = this.db
        .prepare(
          `SELECT ${SELECT_COLUMNS} FROM tasks WHERE status IN (${placeholders}) ORDER BY created_at ASC`,
        )
        .all(...statuses) as TaskRow[]
      return rows.map(mapTask)
    })
  }

  deleteAudioReference(taskId: string): TaskRecord {
    return this.guard('deleteAudioReference', () => {
      const info = this.db
        .prepare('UPDATE tasks SET audio_local_path = NULL, updated_at = ? WHERE id = ?')
        .run(new Date().toISOString(), taskId)
      if (info.changes === 0) {
        throw new StoreError(`Task not found: ${taskId}`, { code: 'E_TASK_NOT_FOUND' })
      }
      return this.getTaskById(taskId)
    })
  }

  deleteTask(taskId: string): number {
    return this.guard('deleteTask', () => this.db.prepare('DELETE FROM tasks WHERE id = ?').run(taskId).changes)
  }

  deleteOlderThan(days: number, now = new Date()): number {
    const cutoff = new Date(now.getTime() - days * 24 * 60 * 60 * 1000).toISOString()
    return this.guard(
      'deleteOlderThan',
      () => this.db.prepare('DELETE FROM tasks WHERE created_at < ?').run(cutoff).changes,
    )
  }

  private findRow(taskId: string): TaskRow | undefined {
    return this.db.prepare(`SELECT ${SELECT_COLUMNS} FROM tasks WHERE id = ?`).get(taskId) as
      | TaskRow
      | undefined
  }

  private writeTask(task: TaskRecord): TaskRecord {
    assertRecordShape(task)
    const existing = this.findRow(task.id)
    if (existing) {
      assertTransition(task.id, existing.status, task.status)
    }

    const now = new Date().toISOString()
    this.db
      .prepare(
        `
        INSERT INTO tasks(
          id, source_url, status, progress, keep_audio, transcript, subtitle_source, audio_ref,
          audio_local_path, audio_fetch_error, title, uploader, error_message, created_at, updated_at, completed_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(id) DO UPDATE SET
          source_url = excluded.source_url,
          status = excluded.status,
          progress = excluded.progress,
          keep_audio = excluded.keep_audio,
          transcript = excluded.transcript,
          subtitle_source = excluded.subtitle_source,
          audio_ref = excluded.audio_ref,
          audio_local_path = excluded.audio_local_path,
          audio_fetch_error = excluded.audio_fetch_error,
          title = excluded.title,
          uploader = excluded.uploader,
          error_message = excluded.error_message,
          created_at = excluded.created_at,
          updated_at = excluded.updated_at,
          completed_at = excluded.completed_at
      `,
      )
      .run(
        task.id,
        task.sourceUrl,
        task.status,
        task.progress,
        task.keepAudio ? 1 : 0,
        task.transcript,
        task.subtitleSource ? JSON.stringify(task.subtitleSource) : null,
        task.audioRef,
        task.audioLocalPath,
        task.audioFetchError,
        task.title,
        task.uploader,
        task.errorMessage,
        task.createdAt,
        now,
        task.completedAt,
      )

    return this.getTaskById(task.id)
  }

  private guard<T>(operation: string, run: () => T): T {
    try {
      return run()
    } catch (error) {
      if (error instanceof StoreError) throw error
      throw new StoreError(`Task store ${operation} failed: ${errorMessage(error)}`, {
        context: { operation },
        cause: error,
      })
    }
  }
}
