import path from 'node:path'
import type { DatabaseContext } from '../db'
import { HttpRemoteTaskClient } from '../remote/HttpRemoteTaskClient'
import type { RemoteTaskClient, SecretProvider } from '../remote/types'
import { TaskEngine } from './TaskEngine'
import { loadHistory, type TaskHistory } from './history/HistoryLoader'

let engine: TaskEngine | null = null
let history: TaskHistory | null = null

export interface TaskEngineOptions {
  /** Defaults to the HTTP client pointed at the configured `remoteBaseUrl`. */
  remote?: RemoteTaskClient
  secretProvider?: SecretProvider
}

export function initTaskEngine(dbContext: DatabaseContext, options: TaskEngineOptions = {}): TaskEngine {
  if (engine) return engine

  const settings = dbContext.settingsDao.getSettings()
  const remote =
    options.remote ??
    new HttpRemoteTaskClient({
      baseUrl: settings.remoteBaseUrl,
      timeoutMs: settings.requestTimeoutMs,
      audioTimeoutMs: settings.audioTimeoutMs,
    })

  engine = new TaskEngine({
    taskDao: dbContext.taskDao,
    settingsDao: dbContext.settingsDao,
    remote,
    secretProvider: options.secretProvider,
    audioDir: path.join(dbContext.dataRoot, 'audio'),
    subtitlesDir: path.join(dbContext.dataRoot, 'subtitles'),
  })
  engine.start()
  history = loadHistory(dbContext.taskDao, settings.historyLimit)

  return engine
}

export function getTaskEngine(): TaskEngine {
  if (!engine) {
    throw new Error('TaskEngine is not initialized. Call initTaskEngine() first.')
  }
  return engine
}

/** Tasks loaded from the store when the engine booted. */
export function getBootHistory(): TaskHistory {
  if (!history) {
    throw new Error('TaskEngine is not initialized. Call initTaskEngine() first.')
  }
  return history
}

export function shutdownTaskEngine(): void {
  engine?.stop()
  engine = null
  history = null
}
