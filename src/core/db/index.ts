import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import Database from 'better-sqlite3'
import { runMigrations } from './migrate'
import { SettingsDao, TaskDao } from './dao'

export interface DatabaseContext {
  dbPath: string
  dataRoot: string
  db: Database.Database
  taskDao: TaskDao
  settingsDao: SettingsDao
}

export interface DatabaseOptions {
  dataRoot?: string
  dbPath?: string
}

const IN_MEMORY = ':memory:'

let context: DatabaseContext | null = null

export function resolveDataRoot(options?: DatabaseOptions): string {
  if (options?.dataRoot) return options.dataRoot
  const fromEnv = process.env.TRANSCRIBE_DATA_ROOT?.trim()
  if (fromEnv) return fromEnv
  return path.join(os.homedir(), '.transcribe-orchestrator')
}

export function resolveDatabasePath(options?: DatabaseOptions): string {
  if (options?.dbPath) return options.dbPath
  return path.join(resolveDataRoot(options), 'tasks.db')
}

/** Open and migrate a database without touching the process-wide context. */
export function openDatabase(options?: DatabaseOptions): DatabaseContext {
  const dbPath = resolveDatabasePath(options)
  const dataRoot =
    options?.dataRoot ?? (dbPath === IN_MEMORY ? resolveDataRoot() : path.dirname(dbPath))

  if (dbPath !== IN_MEMORY) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  const db = new Database(dbPath)
  db.pragma('journal_mode = WAL')

  runMigrations(db)

  const taskDao = new TaskDao(db)
  const settingsDao = new SettingsDao(db)
  settingsDao.initializeDefaults()

  return {
    dbPath,
    dataRoot,
    db,
    taskDao,
    settingsDao,
  }
}

export function initDatabase(options?: DatabaseOptions): DatabaseContext {
  if (context) return context
  context = openDatabase(options)
  return context
}

export function getDatabaseContext(): DatabaseContext {
  if (!context) {
    throw new Error('Database is not initialized. Call initDatabase() first.')
  }
  return context
}

export function closeDatabase(): void {
  if (!context) return
  context.db.close()
  context = null
}
