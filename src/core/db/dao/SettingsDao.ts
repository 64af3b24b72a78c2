import type Database from 'better-sqlite3'
import { z } from 'zod'
import { TaskLifecycleError } from '../../errors'
import type { AppSettings } from '../types'

interface SettingRow {
  key: string
  value: string
}

const DEFAULT_SETTINGS: AppSettings = {
  remoteBaseUrl: 'http://localhost:5001',
  pollIntervalMs: 5_000,
  requestTimeoutMs: 30_000,
  audioTimeoutMs: 60_000,
  defaultMinLength: null,
  historyLimit: 100,
  localRetentionDays: 30,
}

const settingsPatchSchema = z
  .object({
    remoteBaseUrl: z.string().trim().url(),
    pollIntervalMs: z.number().int().min(100).max(10 * 60 * 1000),
    requestTimeoutMs: z.number().int().min(100).max(10 * 60 * 1000),
    audioTimeoutMs: z.number().int().min(100).max(30 * 60 * 1000),
    defaultMinLength: z.number().int().min(1).max(500).nullable(),
    historyLimit: z.number().int().min(1).max(100),
    localRetentionDays: z.number().int().min(1),
  })
  .strict()
  .partial()

const SETTING_KEYS = Object.keys(DEFAULT_SETTINGS)

function decodeSettingValue(value: string): unknown {
  try {
    return JSON.parse(value) as unknown
  } catch {
    return value
  }
}

function encodeSettingValue(value: unknown): string {
  return JSON.stringify(value)
}

function parseRowsToSettings(rows: SettingRow[]): Partial<AppSettings> {
  const raw: Record<string, unknown> = {}
  for (const row of rows) {
    if (!SETTING_KEYS.includes(row.key)) continue
    raw[row.key] = decodeSettingValue(row.value)
  }
  // Rows written by an older build may no longer validate; fall back to defaults for those keys.
  const parsed = settingsPatchSchema.safeParse(raw)
  if (parsed.success) return parsed.data

  const valid: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(raw)) {
    if (settingsPatchSchema.safeParse({ [key]: value }).success) {
      valid[key] = value
    }
  }
  return settingsPatchSchema.parse(valid)
}

export class SettingsDao {
  constructor(private readonly db: Database.Database) {}

  initializeDefaults(): AppSettings {
    const now = new Date().toISOString()
    const statement = this.db.prepare(
      `
      INSERT INTO settings(key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO NOTHING
    `,
    )

    for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
      statement.run(key, encodeSettingValue(value), now)
    }

    return this.getSettings()
  }

  getSettings(): AppSettings {
    const rows = this.db.prepare('SELECT key, value FROM settings').all() as SettingRow[]
    return {
      ...DEFAULT_SETTINGS,
      ...parseRowsToSettings(rows),
    }
  }

  upsertSettings(patch: Partial<AppSettings>): AppSettings {
    const parsed = settingsPatchSchema.safeParse(patch)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new TaskLifecycleError(
        'E_SETTINGS_INVALID',
        issue ? `${issue.path.join('.') || 'settings'}: ${issue.message}` : 'Invalid settings',
      )
    }

    const now = new Date().toISOString()
    const statement = this.db.prepare(`
      INSERT INTO settings(key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `)

    const write = this.db.transaction((entries: Array<[string, unknown]>) => {
      for (const [key, value] of entries) {
        if (value === undefined) continue
        statement.run(key, encodeSettingValue(value), now)
      }
    })
    write(Object.entries(parsed.data))

    return this.getSettings()
  }
}

export { DEFAULT_SETTINGS }
