/**
 * Segment 10: SQLite Adapter Tests
 *
 * The SQLite adapter is the production implementation of the adapter
 * interface. It must satisfy the same laws as the mock from Segment 09 plus
 * its own schema and constraint requirements.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import Database from 'better-sqlite3'
import { createSqliteAdapter, type SqliteAdapter } from '../src/sqlite-adapter'
import { createTask, type Task } from '../src/task'
import { defaultSettings } from '../src/settings'
import { DuplicateKeyError, InvalidDataError } from '../src/errors'
import { datetime } from './helpers/fixtures'

const NOW = datetime('2025-01-01T09:00')

function plainTask(id: string): Task {
  return createTask(id, { name: id, duration: { hours: 1 } }, NOW)
}

function recurringTask(id: string): Task {
  return {
    ...createTask(id, {
      account: 'Alt',
      name: 'Barracks',
      duration: { days: 1, hours: 2, minutes: 30 },
      recurrence: {
        mode: 'custom',
        custom: { days: 1, hours: 2 },
        endAt: datetime('2025-03-01T00:00'),
        skip: { remindEvery: 2, skipCount: 1 },
        pauseUntilAck: true,
        offsetAfterSeconds: -30,
      },
    }, NOW),
    notified: true,
    advanceNotified: true,
    done: true,
    completedAt: datetime('2025-01-01T09:30'),
    pendingDelete: true,
    deleteMarkedAt: datetime('2025-01-01T09:31:15'),
    cursor: { occurrenceCursor: 4, notifyCount: 3 },
  }
}

describe('Segment 10: SQLite Adapter', () => {
  let adapter: SqliteAdapter

  beforeEach(async () => {
    adapter = await createSqliteAdapter(':memory:')
  })

  afterEach(async () => {
    await adapter.close()
  })

  describe('schema', () => {
    it('creates the task, setting and schema_version tables', async () => {
      expect(await adapter.listTables()).toEqual(['schema_version', 'setting', 'task'])
    })

    it('seeds schema version 1', async () => {
      expect(await adapter.getSchemaVersion()).toBe(1)
    })

    it('stores the recurrence rule and cursor in columns', async () => {
      const columns = await adapter.getTableColumns('task')
      expect(columns).toContain('recurrence_mode')
      expect(columns).toContain('occurrence_cursor')
      expect(columns).toContain('notify_count')
      expect(columns[0]).toBe('id')
    })
  })

  describe('tasks', () => {
    it('starts empty', async () => {
      expect(await adapter.loadTasks()).toEqual([])
    })

    it('round-trips a plain task', async () => {
      const task = plainTask('a')
      await adapter.saveTasks([task])
      expect(await adapter.loadTasks()).toEqual([task])
    })

    it('round-trips every field of a recurring task', async () => {
      const task = recurringTask('r')
      await adapter.saveTasks([task])
      expect(await adapter.loadTasks()).toEqual([task])
    })

    it('keeps list order', async () => {
      await adapter.saveTasks([plainTask('c'), plainTask('a'), plainTask('b')])
      expect((await adapter.loadTasks()).map((t) => t.id)).toEqual(['c', 'a', 'b'])
    })

    it('replaces the collection on each save', async () => {
      await adapter.saveTasks([plainTask('a'), plainTask('b')])
      await adapter.saveTasks([plainTask('b')])
      expect((await adapter.loadTasks()).map((t) => t.id)).toEqual(['b'])
    })

    it('rejects duplicate ids and keeps the previous collection', async () => {
      await adapter.saveTasks([plainTask('a')])
      await expect(adapter.saveTasks([plainTask('x'), plainTask('x')])).rejects.toThrow(DuplicateKeyError)
      expect((await adapter.loadTasks()).map((t) => t.id)).toEqual(['a'])
    })

    it('rejects a cursor that counts more notifications than occurrences', async () => {
      await adapter.saveTasks([plainTask('a')])
      const broken = { ...plainTask('b'), cursor: { occurrenceCursor: 0, notifyCount: 2 } }
      await expect(adapter.saveTasks([broken])).rejects.toThrow(InvalidDataError)
      expect((await adapter.loadTasks()).map((t) => t.id)).toEqual(['a'])
    })
  })

  describe('settings', () => {
    it('returns null before anything was saved', async () => {
      expect(await adapter.loadSettings()).toBeNull()
    })

    it('round-trips settings', async () => {
      const settings = {
        ...defaultSettings(),
        advanceNotifySeconds: 600,
        alsoNotifyAtDue: false,
        accounts: ['Main', 'Alt'],
        taskPresets: ['Barracks', 'Lab'],
      }
      await adapter.saveSettings(settings)
      expect(await adapter.loadSettings()).toEqual(settings)
    })
  })
})

describe('Segment 10: SQLite Adapter (file store)', () => {
  let dir: string
  let path: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'upgrade-timers-'))
    path = join(dir, 'store.db')
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('persists across reopen without reseeding the version', async () => {
    const first = await createSqliteAdapter(path)
    await first.saveTasks([plainTask('a')])
    await first.close()

    const second = await createSqliteAdapter(path)
    expect((await second.loadTasks()).map((t) => t.id)).toEqual(['a'])
    expect(await second.getSchemaVersion()).toBe(1)
    await second.close()
  })

  it('rejects a stored instant it cannot parse', async () => {
    const adapter = await createSqliteAdapter(path)
    await adapter.saveTasks([plainTask('a')])
    await adapter.close()

    const db = new Database(path)
    db.prepare("UPDATE task SET finish = 'soon' WHERE id = 'a'").run()
    db.close()

    const reopened = await createSqliteAdapter(path)
    await expect(reopened.loadTasks()).rejects.toThrow("Task 'a': bad finish 'soon'")
    await reopened.close()
  })

  it('rejects an unknown recurrence mode', async () => {
    const adapter = await createSqliteAdapter(path)
    await adapter.saveTasks([plainTask('a')])
    await adapter.close()

    const db = new Database(path)
    db.prepare("UPDATE task SET recurrence_mode = 'hourly' WHERE id = 'a'").run()
    db.close()

    const reopened = await createSqliteAdapter(path)
    await expect(reopened.loadTasks()).rejects.toThrow(InvalidDataError)
    await reopened.close()
  })

  it('ignores unknown setting keys and mistyped values', async () => {
    const adapter = await createSqliteAdapter(path)
    await adapter.saveSettings(defaultSettings())
    await adapter.close()

    const db = new Database(path)
    db.prepare("INSERT INTO setting (key, value) VALUES ('theme', '\"dark\"')").run()
    db.prepare("UPDATE setting SET value = '\"ten\"' WHERE key = 'advanceNotifySeconds'").run()
    db.close()

    const reopened = await createSqliteAdapter(path)
    expect(await reopened.loadSettings()).toEqual({
      alsoNotifyAtDue: true,
      autoDeleteCompletedSeconds: 0,
      pendingDeleteGraceSeconds: 3,
      accounts: ['Default'],
      taskPresets: [],
    })
    await reopened.close()
  })

  it('rejects a setting that is not JSON', async () => {
    const adapter = await createSqliteAdapter(path)
    await adapter.saveSettings(defaultSettings())
    await adapter.close()

    const db = new Database(path)
    db.prepare("UPDATE setting SET value = '{' WHERE key = 'accounts'").run()
    db.close()

    const reopened = await createSqliteAdapter(path)
    await expect(reopened.loadSettings()).rejects.toThrow(InvalidDataError)
    await reopened.close()
  })
})
