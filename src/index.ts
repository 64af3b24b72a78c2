export {
  closeDatabase,
  getDatabaseContext,
  initDatabase,
  openDatabase,
  resolveDataRoot,
  resolveDatabasePath,
  type DatabaseContext,
  type DatabaseOptions,
} from './core/db'
export { DEFAULT_SETTINGS, MAX_RECENT_TASKS, SettingsDao, TaskDao } from './core/db/dao'
export type { AppSettings, TaskRecord, TaskStatus, TimestampPair } from './core/db/types'
export {
  RemoteFailure,
  SegmentationInputError,
  StoreError,
  SubmissionError,
  TaskLifecycleError,
  TransientPollError,
  isTaskLifecycleError,
  type TaskErrorCode,
} from './core/errors'
export { HttpRemoteTaskClient, type HttpRemoteTaskClientOptions } from './core/remote/HttpRemoteTaskClient'
export type {
  RemotePollResult,
  RemoteTaskClient,
  SecretProvider,
  SubmitTaskInput,
} from './core/remote/types'
export {
  getBootHistory,
  getTaskEngine,
  initTaskEngine,
  shutdownTaskEngine,
  type TaskEngineOptions,
} from './core/task-engine'
export { TaskEngine } from './core/task-engine/TaskEngine'
export { TaskHistory, loadHistory, loadHistoryFromFile } from './core/task-engine/history/HistoryLoader'
export { attachConsoleLogger, formatLogLine } from './core/task-engine/logging'
export {
  formatTimestamp,
  isMainlyCjk,
  renderPlainText,
  renderSrt,
  renderSubtitles,
  suggestMinLength,
  synthesize,
  type SubtitleCue,
  type SubtitleFormat,
} from './core/task-engine/subtitles'
export type {
  AudioFetchResult,
  CreateTaskInput,
  DeleteAudioOptions,
  ExportSubtitlesOptions,
  ExportSubtitlesResult,
  TaskEngineEvents,
} from './core/task-engine/types'
