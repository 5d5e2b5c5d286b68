/**
 * SQLite Adapter
 *
 * Production implementation of the upgrade-timers adapter using better-sqlite3.
 * Tasks are stored one row each with their list position; the recurrence rule
 * and skip cursor are flattened into columns. Settings live in a key/value
 * table with JSON values.
 */
import Database from 'better-sqlite3'
import type { Adapter } from './adapter'
import { assertUniqueIds } from './adapter'
import type { Task } from './task'
import type { Settings } from './settings'
import type { LocalDateTime } from './time-date'
import { parseDateTime } from './time-date'
import type { RecurrenceRuleInput } from './recurrence-rule'
import { createRecurrenceRule, isRecurrenceMode, toRecurrenceRuleInput } from './recurrence-rule'
import { DuplicateKeyError, InvalidDataError } from './errors'

// ============================================================================
// Extended type for SQLite-specific introspection methods
// ============================================================================

export type SqliteExtras = {
  listTables(): Promise<string[]>
  getTableColumns(table: string): Promise<string[]>
  getSchemaVersion(): Promise<number>
  close(): Promise<void>
}

export type SqliteAdapter = Adapter & SqliteExtras

const SCHEMA_VERSION = 1

// ============================================================================
// Schema DDL
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS task (
    id TEXT PRIMARY KEY,
    position INTEGER NOT NULL,
    account TEXT NOT NULL,
    name TEXT NOT NULL,
    start TEXT,
    duration_days INTEGER NOT NULL DEFAULT 0,
    duration_hours INTEGER NOT NULL DEFAULT 0,
    duration_minutes INTEGER NOT NULL DEFAULT 0,
    finish TEXT NOT NULL,
    notified INTEGER NOT NULL DEFAULT 0,
    advance_notified INTEGER NOT NULL DEFAULT 0,
    awaiting_ack INTEGER NOT NULL DEFAULT 0,
    expired INTEGER NOT NULL DEFAULT 0,
    done INTEGER NOT NULL DEFAULT 0,
    completed_at TEXT,
    pending_delete INTEGER NOT NULL DEFAULT 0,
    delete_marked_at TEXT,
    recurrence_mode TEXT NOT NULL DEFAULT 'none',
    custom_years INTEGER NOT NULL DEFAULT 0,
    custom_months INTEGER NOT NULL DEFAULT 0,
    custom_days INTEGER NOT NULL DEFAULT 0,
    custom_hours INTEGER NOT NULL DEFAULT 0,
    custom_minutes INTEGER NOT NULL DEFAULT 0,
    custom_seconds INTEGER NOT NULL DEFAULT 0,
    end_at TEXT,
    remind_every INTEGER NOT NULL DEFAULT 0,
    skip_count INTEGER NOT NULL DEFAULT 0,
    pause_until_ack INTEGER NOT NULL DEFAULT 0,
    offset_after_seconds INTEGER NOT NULL DEFAULT 0,
    occurrence_cursor INTEGER NOT NULL DEFAULT 0,
    notify_count INTEGER NOT NULL DEFAULT 0,
    CHECK (notify_count >= 0 AND occurrence_cursor >= notify_count)
  );
  CREATE INDEX IF NOT EXISTS idx_task_position ON task(position);

  CREATE TABLE IF NOT EXISTS setting (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  );
`

// ============================================================================
// Error Mapping
// ============================================================================

function mapError(e: unknown): never {
  const msg = e instanceof Error ? e.message : String(e)
  if (/UNIQUE constraint/i.test(msg)) throw new DuplicateKeyError(msg)
  if (/CHECK constraint/i.test(msg)) throw new InvalidDataError(msg)
  throw e
}

function safe<T>(fn: () => T): T {
  try { return fn() }
  catch (e) { mapError(e) }
}

// ============================================================================
// SQL Row Types
// ============================================================================

type TaskRow = {
  id: string
  position: number
  account: string
  name: string
  start: string | null
  duration_days: number
  duration_hours: number
  duration_minutes: number
  finish: string
  notified: number
  advance_notified: number
  awaiting_ack: number
  expired: number
  done: number
  completed_at: string | null
  pending_delete: number
  delete_marked_at: string | null
  recurrence_mode: string
  custom_years: number
  custom_months: number
  custom_days: number
  custom_hours: number
  custom_minutes: number
  custom_seconds: number
  end_at: string | null
  remind_every: number
  skip_count: number
  pause_until_ack: number
  offset_after_seconds: number
  occurrence_cursor: number
  notify_count: number
}

type SettingRow = {
  key: string
  value: string
}

type SchemaVersionRow = {
  v: number | null
}

// ============================================================================
// Row Mapping
// ============================================================================

function instant(value: string, column: string, id: string): LocalDateTime {
  const result = parseDateTime(value)
  if (!result.ok) throw new InvalidDataError(`Task '${id}': bad ${column} '${value}'`)
  return result.value
}

function optionalInstant(value: string | null, column: string, id: string): LocalDateTime | null {
  return value === null ? null : instant(value, column, id)
}

function toRuleInput(row: TaskRow): RecurrenceRuleInput {
  if (!isRecurrenceMode(row.recurrence_mode)) {
    throw new InvalidDataError(`Task '${row.id}': unknown recurrence mode '${row.recurrence_mode}'`)
  }
  return {
    mode: row.recurrence_mode,
    custom: {
      years: row.custom_years,
      months: row.custom_months,
      days: row.custom_days,
      hours: row.custom_hours,
      minutes: row.custom_minutes,
      seconds: row.custom_seconds,
    },
    endAt: optionalInstant(row.end_at, 'end_at', row.id),
    skip: { remindEvery: row.remind_every, skipCount: row.skip_count },
    pauseUntilAck: row.pause_until_ack === 1,
    offsetAfterSeconds: row.offset_after_seconds,
  }
}

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    account: row.account,
    name: row.name,
    start: optionalInstant(row.start, 'start', row.id),
    duration: { days: row.duration_days, hours: row.duration_hours, minutes: row.duration_minutes },
    finish: instant(row.finish, 'finish', row.id),
    notified: row.notified === 1,
    advanceNotified: row.advance_notified === 1,
    awaitingAck: row.awaiting_ack === 1,
    expired: row.expired === 1,
    done: row.done === 1,
    completedAt: optionalInstant(row.completed_at, 'completed_at', row.id),
    pendingDelete: row.pending_delete === 1,
    deleteMarkedAt: optionalInstant(row.delete_marked_at, 'delete_marked_at', row.id),
    recurrence: createRecurrenceRule(toRuleInput(row)),
    cursor: { occurrenceCursor: row.occurrence_cursor, notifyCount: row.notify_count },
  }
}

function toRow(task: Task, position: number): TaskRow {
  const rule = toRecurrenceRuleInput(task.recurrence)
  return {
    id: task.id,
    position,
    account: task.account,
    name: task.name,
    start: task.start,
    duration_days: task.duration.days,
    duration_hours: task.duration.hours,
    duration_minutes: task.duration.minutes,
    finish: task.finish,
    notified: task.notified ? 1 : 0,
    advance_notified: task.advanceNotified ? 1 : 0,
    awaiting_ack: task.awaitingAck ? 1 : 0,
    expired: task.expired ? 1 : 0,
    done: task.done ? 1 : 0,
    completed_at: task.completedAt,
    pending_delete: task.pendingDelete ? 1 : 0,
    delete_marked_at: task.deleteMarkedAt,
    recurrence_mode: rule.mode,
    custom_years: rule.custom?.years ?? 0,
    custom_months: rule.custom?.months ?? 0,
    custom_days: rule.custom?.days ?? 0,
    custom_hours: rule.custom?.hours ?? 0,
    custom_minutes: rule.custom?.minutes ?? 0,
    custom_seconds: rule.custom?.seconds ?? 0,
    end_at: rule.endAt ?? null,
    remind_every: rule.skip?.remindEvery ?? 0,
    skip_count: rule.skip?.skipCount ?? 0,
    pause_until_ack: rule.pauseUntilAck ? 1 : 0,
    offset_after_seconds: rule.offsetAfterSeconds ?? 0,
    occurrence_cursor: task.cursor.occurrenceCursor,
    notify_count: task.cursor.notifyCount,
  }
}

const TASK_COLUMNS = [
  'id', 'position', 'account', 'name', 'start',
  'duration_days', 'duration_hours', 'duration_minutes',
  'finish', 'notified', 'advance_notified', 'awaiting_ack', 'expired',
  'done', 'completed_at', 'pending_delete', 'delete_marked_at',
  'recurrence_mode', 'custom_years', 'custom_months', 'custom_days',
  'custom_hours', 'custom_minutes', 'custom_seconds', 'end_at',
  'remind_every', 'skip_count', 'pause_until_ack', 'offset_after_seconds',
  'occurrence_cursor', 'notify_count',
] as const satisfies readonly (keyof TaskRow)[]

const INSERT_TASK_SQL =
  `INSERT INTO task (${TASK_COLUMNS.join(', ')}) VALUES (${TASK_COLUMNS.map((c) => '@' + c).join(', ')})`

// ============================================================================
// Settings Decoding
// ============================================================================

const SETTING_KEYS = [
  'advanceNotifySeconds',
  'alsoNotifyAtDue',
  'autoDeleteCompletedSeconds',
  'pendingDeleteGraceSeconds',
  'accounts',
  'taskPresets',
  'autoDeleteCompletedAfter1Min',
] as const

type SettingKey = (typeof SETTING_KEYS)[number]

function isSettingKey(key: string): key is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(key)
}

function decodeNumber(raw: unknown): number | undefined {
  return typeof raw === 'number' ? raw : undefined
}

function decodeBoolean(raw: unknown): boolean | undefined {
  return typeof raw === 'boolean' ? raw : undefined
}

function decodeStrings(raw: unknown): string[] | undefined {
  return Array.isArray(raw) ? raw.filter((v): v is string => typeof v === 'string') : undefined
}

function decodeSetting(settings: Partial<Settings>, key: SettingKey, json: string): void {
  let raw: unknown
  try {
    raw = JSON.parse(json)
  } catch (e) {
    throw new InvalidDataError(`Setting '${key}' is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }

  switch (key) {
    case 'advanceNotifySeconds':
    case 'autoDeleteCompletedSeconds':
    case 'pendingDeleteGraceSeconds': {
      const v = decodeNumber(raw)
      if (v !== undefined) settings[key] = v
      break
    }
    case 'alsoNotifyAtDue':
    case 'autoDeleteCompletedAfter1Min': {
      const v = decodeBoolean(raw)
      if (v !== undefined) settings[key] = v
      break
    }
    case 'accounts':
    case 'taskPresets': {
      const v = decodeStrings(raw)
      if (v !== undefined) settings[key] = v
      break
    }
  }
}

// ============================================================================
// Factory
// ============================================================================

export async function createSqliteAdapter(path: string): Promise<SqliteAdapter> {
  const db = new Database(path)
  db.exec(SCHEMA_SQL)

  // Seed initial schema version if empty
  const ver = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
  if (ver?.v == null) {
    db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
      SCHEMA_VERSION, new Date().toISOString(),
    )
  }

  const insertTask = db.prepare<[TaskRow]>(INSERT_TASK_SQL)
  const upsertSetting = db.prepare<[string, string]>(
    'INSERT INTO setting (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
  )

  const replaceTasks = db.transaction((tasks: readonly Task[]) => {
    db.prepare('DELETE FROM task').run()
    tasks.forEach((task, i) => insertTask.run(toRow(task, i)))
  })

  const writeSettings = db.transaction((settings: Settings) => {
    db.prepare('DELETE FROM setting').run()
    for (const key of SETTING_KEYS) {
      const value = settings[key]
      if (value !== undefined) upsertSetting.run(key, JSON.stringify(value))
    }
  })

  const adapter: SqliteAdapter = {
    // ================================================================
    // Tasks
    // ================================================================
    async loadTasks() {
      const rows = db.prepare<[], TaskRow>('SELECT * FROM task ORDER BY position ASC').all()
      return rows.map(toTask)
    },

    async saveTasks(tasks) {
      assertUniqueIds(tasks)
      safe(() => replaceTasks(tasks))
    },

    // ================================================================
    // Settings
    // ================================================================
    async loadSettings() {
      const rows = db.prepare<[], SettingRow>('SELECT key, value FROM setting').all()
      if (rows.length === 0) return null
      const settings: Partial<Settings> = {}
      for (const row of rows) {
        if (isSettingKey(row.key)) decodeSetting(settings, row.key, row.value)
      }
      return settings
    },

    async saveSettings(settings) {
      safe(() => writeSettings(settings))
    },

    // ================================================================
    // Introspection
    // ================================================================
    async listTables() {
      const rows = db.prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name",
      ).all()
      return rows.map((r) => r.name)
    },

    async getTableColumns(table: string) {
      const rows = db.prepare<[], { name: string }>(`PRAGMA table_info("${table}")`).all()
      return rows.map((r) => r.name)
    },

    async getSchemaVersion() {
      const row = db.prepare<[], SchemaVersionRow>('SELECT MAX(version) as v FROM schema_version').get()
      return row?.v ?? 0
    },

    async close() {
      db.close()
    },
  }

  return adapter
}
