import type Database from 'better-sqlite3'
import { SCHEMA_SQL } from './schema'

interface Migration {
  version: number
  description: string
  up: (db: Database.Database) => void
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'tasks and settings tables',
    up: (db) => db.exec(SCHEMA_SQL),
  },
]

export const LATEST_SCHEMA_VERSION = MIGRATIONS[MIGRATIONS.length - 1].version

export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare('SELECT COALESCE(MAX(version), 0) AS version FROM schema_migrations')
    .get() as { version: number } | undefined

  return row?.version ?? 0
}

/** Apply every pending migration, each in its own transaction. Returns the versions applied. */
export function runMigrations(db: Database.Database): number[] {
  db.exec(
    'CREATE TABLE IF NOT EXISTS schema_migrations (version INTEGER PRIMARY KEY, applied_at TEXT NOT NULL)',
  )

  const current = getSchemaVersion(db)
  if (current > LATEST_SCHEMA_VERSION) {
    throw new Error(
      `Database schema version (${current}) is newer than this build supports (${LATEST_SCHEMA_VERSION})`,
    )
  }

  const record = db.prepare('INSERT INTO schema_migrations(version, applied_at) VALUES (?, ?)')
  const applied: number[] = []
  for (const migration of MIGRATIONS) {
    if (migration.version <= current) continue
    db.transaction(() => {
      migration.up(db)
      record.run(migration.version, new Date().toISOString())
    })()
    applied.push(migration.version)
  }
  return applied
}
