import { EventEmitter } from 'node:events'
import fs from 'node:fs/promises'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import type { SettingsDao, TaskDao } from '../db/dao'
import { awaitsAudioFetch, isTerminalStatus, type TaskRecord, type TimestampPair } from '../db/types'
import {
  RemoteFailure,
  SubmissionError,
  TaskLifecycleError,
  TransientPollError,
  errorMessage,
} from '../errors'
import type { RemotePollResult, RemoteTaskClient, SecretProvider } from '../remote/types'
import {
  AUDIO_FILE_EXTENSION,
  PROGRESS_COMPLETED,
  PROGRESS_FAILED,
  PROGRESS_SUBMISSION_FAILED,
  PROGRESS_SUBMITTED,
} from './constants'
import { KeyedLock } from './polling/KeyedLock'
import { TaskPoller } from './polling/TaskPoller'
import { TaskRecovery, type RecoveryOutcome } from './recovery/TaskRecovery'
import { renderSubtitles, suggestMinLength, synthesize, type SubtitleCue } from './subtitles'
import type {
  AudioFetchResult,
  CreateTaskInput,
  DeleteAudioOptions,
  EventName,
  ExportSubtitlesOptions,
  ExportSubtitlesResult,
  Listener,
  LogLevel,
  LogStage,
  TaskEngineEvents,
} from './types'
import { nowIso, toSafeFileName, withTimeout } from './utils'

type PollOutcome = { keepPolling: boolean; fetchAudio: boolean }

/**
 * Owns the lifecycle of transcription tasks: submission, concurrent polling,
 * post-completion audio handling and write-through persistence.
 */
export class TaskEngine {
  private readonly emitter = new EventEmitter()
  private readonly locks = new KeyedLock()
  private readonly poller: TaskPoller
  /** Completed tasks whose audio download is still owed; retried on the poll interval. */
  private readonly audioRetries: TaskPoller
  private readonly recovery: TaskRecovery

  constructor(
    private readonly deps: {
      taskDao: TaskDao
      settingsDao: SettingsDao
      remote: RemoteTaskClient
      secretProvider?: SecretProvider
      audioDir: string
      subtitlesDir: string
    },
  ) {
    this.poller = new TaskPoller({
      intervalMs: () => this.deps.settingsDao.getSettings().pollIntervalMs,
      tick: (taskId, isCurrent) => this.pollOnce(taskId, isCurrent),
      onTickError: (taskId, error) => {
        this.log(taskId, 'polling', 'error', `Poll result could not be applied: ${errorMessage(error)}`)
      },
    })
    this.audioRetries = new TaskPoller({
      intervalMs: () => this.deps.settingsDao.getSettings().pollIntervalMs,
      tick: (taskId, isCurrent) => this.locks.run(taskId, () => this.retryAudioLocked(taskId, isCurrent)),
      onTickError: (taskId, error) => {
        this.log(taskId, 'audio', 'error', `Audio retry could not run: ${errorMessage(error)}`)
      },
    })
    this.recovery = new TaskRecovery({ taskDao: deps.taskDao })
  }

  /** Register a typed event listener and return an unsubscribe callback. */
  on<T extends EventName>(event: T, listener: Listener<T>): () => void {
    this.emitter.on(event, listener as (...args: unknown[]) => void)
    return () => {
      this.emitter.off(event, listener as (...args: unknown[]) => void)
    }
  }

  /** Recover interrupted tasks and resume polling those still running remotely. */
  start(): RecoveryOutcome {
    const outcome = this.recovery.recoverInterruptedTasks()
    for (const taskId of outcome.failedTaskIds) {
      this.log(taskId, 'recovery', 'warn', 'Task never reached the remote service; marked failed')
    }
    for (const taskId of outcome.resumedTaskIds) {
      this.poller.track(taskId)
    }
    if (outcome.resumedTaskIds.length > 0) {
      this.log(null, 'recovery', 'info', `Resumed polling for ${outcome.resumedTaskIds.length} task(s)`)
    }
    for (const taskId of outcome.pendingAudioTaskIds) {
      this.audioRetries.track(taskId)
    }
    if (outcome.pendingAudioTaskIds.length > 0) {
      this.log(null, 'recovery', 'info', `Resumed audio download for ${outcome.pendingAudioTaskIds.length} task(s)`)
    }
    return outcome
  }

  stop(): void {
    this.poller.stop()
    this.audioRetries.stop()
  }

  async createTask(input: CreateTaskInput): Promise<TaskRecord> {
    const sourceUrl = input.sourceUrl.trim()
    if (!sourceUrl) {
      throw new TaskLifecycleError('E_PRECONDITION', 'sourceUrl is required')
    }

    const createdAt = nowIso()
    const draft = this.deps.taskDao.upsert({
      id: randomUUID(),
      sourceUrl,
      status: 'created',
      progress: null,
      keepAudio: input.keepAudio,
      transcript: null,
      subtitleSource: null,
      audioRef: null,
      audioLocalPath: null,
      audioFetchError: null,
      title: null,
      uploader: null,
      errorMessage: null,
      createdAt,
      updatedAt: createdAt,
      completedAt: null,
    })
    this.emitStatus(draft)

    let remoteId: string
    try {
      const encryptedSecret = await this.encryptSecret(input.secretPayload)
      remoteId = await withTimeout(
        this.deps.remote.submit({ url: sourceUrl, keepAudio: input.keepAudio, encryptedSecret }),
        this.requestTimeoutMs(),
        'Submission',
      )
    } catch (error) {
      const failure =
        error instanceof SubmissionError
          ? error
          : new SubmissionError(errorMessage(error), { cause: error })
      return this.markSubmissionFailed(draft, failure)
    }

    let submitted: TaskRecord
    try {
      submitted = this.deps.taskDao.rekey(draft.id, {
        ...draft,
        id: remoteId,
        status: 'submitted',
        progress: PROGRESS_SUBMITTED,
      })
    } catch (error) {
      this.markSubmissionFailed(
        draft,
        new SubmissionError(`Remote task ${remoteId} could not be recorded: ${errorMessage(error)}`, {
          cause: error,
        }),
      )
      throw error
    }

    this.emitStatus(submitted)
    this.log(submitted.id, 'submission', 'info', `Submitted ${sourceUrl}`)
    this.poller.track(submitted.id)
    return submitted
  }

  getTask(taskId: string): TaskRecord | null {
    return this.deps.taskDao.get(taskId)
  }

  listRecentTasks(limit?: number): TaskRecord[] {
    return this.deps.taskDao.listRecent(limit ?? this.deps.settingsDao.getSettings().historyLimit)
  }

  isPolling(taskId: string): boolean {
    return this.poller.isTracked(taskId)
  }

  pollingTaskIds(): string[] {
    return this.poller.trackedTaskIds()
  }

  /** Tasks with an audio download scheduled for retry. */
  pendingAudioTaskIds(): string[] {
    return this.audioRetries.trackedTaskIds()
  }

  /**
   * Stop watching a task, including any scheduled audio retry. A poll already in
   * flight is discarded when it returns.
   */
  abandonTask(taskId: string): boolean {
    const polling = this.poller.untrack(taskId)
    const audio = this.audioRetries.untrack(taskId)
    const removed = polling || audio
    if (removed) {
      this.log(taskId, 'polling', 'info', 'Polling abandoned')
    }
    return removed
  }

  /**
   * Download the remote audio for a completed task, then ask the remote service to
   * drop its copy. Download and write failures are recorded on the task and
   * returned, never thrown; the task then stays scheduled for retry.
   */
  async requestAudioFetch(taskId: string): Promise<AudioFetchResult> {
    const result = await this.locks.run(taskId, () => this.fetchAudioLocked(taskId))
    if (result.fetched) {
      this.audioRetries.untrack(taskId)
    } else {
      this.audioRetries.track(taskId, this.deps.settingsDao.getSettings().pollIntervalMs)
    }
    return result
  }

  /** Remove the local audio file and/or the remote copy. Status and transcript are untouched. */
  deleteAudio(taskId: string, options: DeleteAudioOptions = {}): Promise<TaskRecord> {
    const removeLocal = options.local ?? true
    const removeRemote = options.remote ?? true

    return this.locks.run(taskId, async () => {
      let task = this.deps.taskDao.getTaskById(taskId)
      this.audioRetries.untrack(taskId)

      if (removeLocal && task.audioLocalPath) {
        await fs.rm(task.audioLocalPath, { force: true })
        task = this.deps.taskDao.deleteAudioReference(taskId)
        this.emit('audio', { taskId, action: 'deleted' })
        this.log(taskId, 'audio', 'info', 'Local audio removed')
      }

      if (removeRemote) {
        await withTimeout(this.deps.remote.deleteAudio(taskId), this.requestTimeoutMs(), 'Remote audio cleanup')
        this.emit('audio', { taskId, action: 'remoteCleaned' })
        this.log(taskId, 'audio', 'info', 'Remote audio cleaned up')
      }

      return task
    })
  }

  async bulkCleanup(maxAgeHours: number): Promise<number> {
    if (!Number.isFinite(maxAgeHours) || maxAgeHours < 0) {
      throw new TaskLifecycleError('E_PRECONDITION', 'maxAgeHours must be a non-negative number')
    }
    const deleted = await withTimeout(
      this.deps.remote.cleanup(maxAgeHours),
      this.requestTimeoutMs(),
      'Remote cleanup',
    )
    const count = Number.isFinite(deleted) ? Math.max(0, Math.floor(deleted)) : 0
    this.log(null, 'cleanup', 'info', `Remote cleanup removed ${count} audio file(s) older than ${maxAgeHours}h`)
    return count
  }

  synthesize(text: string, timestamps: readonly TimestampPair[], minLength: number): SubtitleCue[] {
    return synthesize(text, timestamps, minLength)
  }

  async exportSubtitles(taskId: string, options: ExportSubtitlesOptions = {}): Promise<ExportSubtitlesResult> {
    const task = this.deps.taskDao.getTaskById(taskId)
    if (task.status !== 'completed' || task.transcript === null || task.subtitleSource === null) {
      throw new TaskLifecycleError('E_PRECONDITION', `Task ${taskId} has no transcript to export`)
    }

    const format = options.format ?? 'srt'
    const minLength =
      options.minLength ??
      this.deps.settingsDao.getSettings().defaultMinLength ??
      suggestMinLength(task.transcript)
    const cues = synthesize(task.transcript, task.subtitleSource, minLength)

    const outputPath =
      options.outputPath ?? path.join(this.deps.subtitlesDir, `${toSafeFileName(taskId)}.${format}`)
    await fs.mkdir(path.dirname(outputPath), { recursive: true })
    await fs.writeFile(outputPath, renderSubtitles(cues, format), 'utf-8')

    return { path: outputPath, cueCount: cues.length, minLength }
  }

  /** Remove the local record and local audio. The remote side is not contacted. */
  deleteTask(taskId: string): Promise<boolean> {
    return this.locks.run(taskId, async () => {
      this.poller.untrack(taskId)
      this.audioRetries.untrack(taskId)
      const task = this.deps.taskDao.get(taskId)
      if (!task) return false
      if (task.audioLocalPath) {
        await fs.rm(task.audioLocalPath, { force: true })
      }
      return this.deps.taskDao.deleteTask(taskId) > 0
    })
  }

  pruneLocalHistory(days?: number): number {
    const retentionDays = days ?? this.deps.settingsDao.getSettings().localRetentionDays
    if (!Number.isFinite(retentionDays) || retentionDays < 0) {
      throw new TaskLifecycleError('E_PRECONDITION', 'days must be a non-negative number')
    }
    const deleted = this.deps.taskDao.deleteOlderThan(retentionDays)
    this.log(null, 'cleanup', 'info', `Pruned ${deleted} local task(s) older than ${retentionDays} day(s)`)
    return deleted
  }

  private async pollOnce(taskId: string, isCurrent: () => boolean): Promise<boolean> {
    let result: RemotePollResult
    try {
      result = await withTimeout(this.deps.remote.poll(taskId), this.requestTimeoutMs(), 'Status query')
    } catch (error) {
      const transient =
        error instanceof TransientPollError
          ? error
          : new TransientPollError(errorMessage(error), { cause: error })
      this.log(taskId, 'polling', 'warn', `Transient poll failure, retrying next tick: ${transient.message}`)
      return true
    }

    const outcome = await this.locks.run(taskId, () => this.applyPollResult(taskId, result, isCurrent))
    if (outcome.fetchAudio) {
      this.audioRetries.track(taskId)
    }
    return outcome.keepPolling
  }

  private applyPollResult(
    taskId: string,
    result: RemotePollResult,
    isCurrent: () => boolean,
  ): PollOutcome {
    if (!isCurrent()) {
      this.log(taskId, 'polling', 'info', 'Discarded poll result for a task no longer under watch')
      return { keepPolling: false, fetchAudio: false }
    }

    const task = this.deps.taskDao.get(taskId)
    if (!task || isTerminalStatus(task.status)) {
      this.poller.untrack(taskId)
      return { keepPolling: false, fetchAudio: false }
    }

    switch (result.status) {
      case 'processing': {
        const updated = this.deps.taskDao.upsert({
          ...task,
          status: 'processing',
          progress: result.progress,
        })
        if (task.status !== 'processing') {
          this.emitStatus(updated)
        }
        this.emit('progress', { taskId, message: result.progress })
        return { keepPolling: true, fetchAudio: false }
      }
      case 'completed': {
        const completed = this.deps.taskDao.upsert({
          ...task,
          status: 'completed',
          progress: PROGRESS_COMPLETED,
          transcript: result.transcript,
          subtitleSource: result.timestamps,
          audioRef: result.audioRef ?? null,
          title: result.title ?? null,
          uploader: result.uploader ?? null,
          completedAt: nowIso(),
        })
        this.poller.untrack(taskId)
        const fetchAudio = completed.keepAudio && completed.audioRef !== null
        this.emitStatus(completed)
        this.emit('completed', { taskId, audioRequested: fetchAudio })
        this.log(taskId, 'polling', 'info', 'Transcription completed')
        return { keepPolling: false, fetchAudio }
      }
      case 'failed': {
        const failure = new RemoteFailure(result.errorMessage, { context: { taskId } })
        const failed = this.deps.taskDao.upsert({
          ...task,
          status: 'failed',
          progress: PROGRESS_FAILED,
          errorMessage: failure.message,
          completedAt: nowIso(),
        })
        this.poller.untrack(taskId)
        this.emitStatus(failed)
        this.emit('failed', {
          taskId,
          stage: 'remote',
          errorCode: failure.code,
          errorMessage: failure.message,
        })
        this.log(taskId, 'polling', 'error', `Remote task failed: ${failure.message}`)
        return { keepPolling: false, fetchAudio: false }
      }
    }
  }

  private async fetchAudioLocked(taskId: string): Promise<AudioFetchResult> {
    const task = this.deps.taskDao.getTaskById(taskId)
    if (!task.keepAudio || task.status !== 'completed') {
      throw new TaskLifecycleError(
        'E_PRECONDITION',
        `Audio is only kept for completed tasks created with keepAudio (task ${taskId})`,
      )
    }
    if (!task.audioRef) {
      throw new TaskLifecycleError('E_PRECONDITION', `Remote service reported no audio for task ${taskId}`)
    }

    if (task.audioLocalPath) {
      return { fetched: true, path: task.audioLocalPath }
    }

    const audioPath = path.join(this.deps.audioDir, `${toSafeFileName(taskId)}${AUDIO_FILE_EXTENSION}`)
    try {
      const payload = await withTimeout(
        this.deps.remote.fetchAudio(taskId, task.audioRef),
        this.deps.settingsDao.getSettings().audioTimeoutMs,
        'Audio download',
      )
      await fs.mkdir(this.deps.audioDir, { recursive: true })
      await fs.writeFile(audioPath, payload)
    } catch (error) {
      const message = errorMessage(error)
      this.deps.taskDao.upsert({ ...task, audioFetchError: message })
      this.emit('audio', { taskId, action: 'fetchFailed', message })
      this.log(taskId, 'audio', 'warn', `Audio download failed, retrying next tick: ${message}`)
      return { fetched: false, errorMessage: message }
    }

    this.deps.taskDao.upsert({ ...task, audioLocalPath: audioPath, audioFetchError: null })
    this.emit('audio', { taskId, action: 'fetched', path: audioPath })
    this.log(taskId, 'audio', 'info', `Audio saved to ${audioPath}`)

    try {
      await withTimeout(this.deps.remote.deleteAudio(taskId), this.requestTimeoutMs(), 'Remote audio cleanup')
      this.emit('audio', { taskId, action: 'remoteCleaned' })
    } catch (error) {
      this.log(taskId, 'audio', 'warn', `Remote audio cleanup failed: ${errorMessage(error)}`)
    }

    return { fetched: true, path: audioPath }
  }

  private async retryAudioLocked(taskId: string, isCurrent: () => boolean): Promise<boolean> {
    if (!isCurrent()) return false
    const task = this.deps.taskDao.get(taskId)
    if (!task || !awaitsAudioFetch(task)) return false
    const result = await this.fetchAudioLocked(taskId)
    return !result.fetched
  }

  private async encryptSecret(secretPayload?: string): Promise<string | undefined> {
    if (secretPayload === undefined) return undefined
    if (!this.deps.secretProvider) {
      throw new SubmissionError('A secret payload was given but no secret provider is configured')
    }
    return this.deps.secretProvider.encrypt(secretPayload)
  }

  private markSubmissionFailed(draft: TaskRecord, failure: SubmissionError): TaskRecord {
    const message = failure.message
    const failed = this.deps.taskDao.upsert({
      ...draft,
      status: 'failed',
      progress: PROGRESS_SUBMISSION_FAILED,
      errorMessage: message,
      completedAt: nowIso(),
    })
    this.emitStatus(failed)
    this.emit('failed', {
      taskId: failed.id,
      stage: 'submission',
      errorCode: failure.code,
      errorMessage: message,
    })
    this.log(failed.id, 'submission', 'error', `Submission failed: ${message}`)
    return failed
  }

  private requestTimeoutMs(): number {
    return this.deps.settingsDao.getSettings().requestTimeoutMs
  }

  private emitStatus(task: TaskRecord): void {
    this.emit('status', { taskId: task.id, status: task.status, timestamp: task.updatedAt })
  }

  private log(taskId: string | null, stage: LogStage, level: LogLevel, text: string): void {
    this.emit('log', { taskId, stage, level, text, timestamp: nowIso() })
  }

  private emit<T extends EventName>(event: T, payload: TaskEngineEvents[T]): void {
    this.emitter.emit(event, payload)
  }
}
