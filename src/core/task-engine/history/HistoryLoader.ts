import fs from 'node:fs'
import Database from 'better-sqlite3'
import { MAX_RECENT_TASKS, TaskDao } from '../../db/dao'
import type { TaskRecord } from '../../db/types'

/** Read-only, newest-first view of recently persisted tasks. */
export class TaskHistory {
  private readonly tasks = new Map<string, TaskRecord>()

  constructor(records: TaskRecord[]) {
    for (const record of records) {
      this.tasks.set(record.id, record)
    }
  }

  get(taskId: string): TaskRecord | undefined {
    return this.tasks.get(taskId)
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId)
  }

  list(): TaskRecord[] {
    return Array.from(this.tasks.values())
  }

  get size(): number {
    return this.tasks.size
  }
}

export function loadHistory(
  taskDao: Pick<TaskDao, 'listRecent'>,
  limit = MAX_RECENT_TASKS,
): TaskHistory {
  return new TaskHistory(taskDao.listRecent(limit))
}

/**
 * Boot-time load straight from the database file. The file is opened read-only; a
 * missing file or a database without the tasks table yields an empty history.
 */
export function loadHistoryFromFile(dbPath: string, limit = MAX_RECENT_TASKS): TaskHistory {
  if (!fs.existsSync(dbPath)) {
    return new TaskHistory([])
  }

  const db = new Database(dbPath, { readonly: true, fileMustExist: true })
  try {
    const table = db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'tasks'")
      .get()
    if (!table) {
      return new TaskHistory([])
    }
    return loadHistory(new TaskDao(db), limit)
  } finally {
    db.close()
  }
}
