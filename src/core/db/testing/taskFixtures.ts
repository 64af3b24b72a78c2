import type { TaskRecord } from '../types'

export function buildTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  const createdAt = overrides.createdAt ?? '2026-01-01T00:00:00.000Z'
  return {
    id: 'task-1',
    sourceUrl: 'https://video.example.com/watch/1',
    status: 'submitted',
    progress: null,
    keepAudio: false,
    transcript: null,
    subtitleSource: null,
    audioRef: null,
    audioLocalPath: null,
    audioFetchError: null,
    title: null,
    uploader: null,
    errorMessage: null,
    updatedAt: createdAt,
    completedAt: null,
    ...overrides,
    createdAt,
  }
}

export function buildCompletedTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return buildTask({
    status: 'completed',
    progress: 'Completed',
    transcript: '你好，世界。',
    subtitleSource: [
      [0, 100],
      [100, 200],
      [300, 400],
      [400, 500],
    ],
    completedAt: '2026-01-01T00:05:00.000Z',
    ...overrides,
  })
}
