/**
 * Adapter
 *
 * Persistence interface for tasks and settings + in-memory mock
 * implementation. All methods are async so that sync (better-sqlite3) and
 * async stores share one shape.
 */

import type { Task } from './task'
import { cloneTask } from './task'
import type { Settings } from './settings'
import { normalizeSettings } from './settings'
import { DuplicateKeyError } from './errors'

// ============================================================================
// Adapter Interface
// ============================================================================

export interface Adapter {
  /** Tasks in list order */
  loadTasks(): Promise<Task[]>
  /** Replaces the stored collection; order is preserved */
  saveTasks(tasks: readonly Task[]): Promise<void>
  /** `null` when nothing was stored yet */
  loadSettings(): Promise<Partial<Settings> | null>
  saveSettings(settings: Settings): Promise<void>
  close?(): Promise<void>
}

// ============================================================================
// Helpers
// ============================================================================

export function assertUniqueIds(tasks: readonly Task[]): void {
  const seen = new Set<string>()
  for (const task of tasks) {
    if (seen.has(task.id)) throw new DuplicateKeyError(`Task '${task.id}' appears twice`)
    seen.add(task.id)
  }
}

// ============================================================================
// Mock Adapter
// ============================================================================

export type MockAdapter = Adapter & {
  /** Number of completed saveTasks calls */
  readonly saveCount: number
  /** Makes the next saves reject with `error` until cleared with `null` */
  failSavesWith(error: Error | null): void
}

export function createMockAdapter(initial: { tasks?: Task[]; settings?: Partial<Settings> } = {}): MockAdapter {
  // ---- State ----
  let tasks: Task[] = (initial.tasks ?? []).map(cloneTask)
  let settings: Partial<Settings> | null = initial.settings ? structuredClone(initial.settings) : null
  let saveCount = 0
  let saveError: Error | null = null

  return {
    get saveCount() {
      return saveCount
    },

    failSavesWith(error) {
      saveError = error
    },

    async loadTasks() {
      return tasks.map(cloneTask)
    },

    async saveTasks(next) {
      if (saveError) throw saveError
      assertUniqueIds(next)
      tasks = next.map(cloneTask)
      saveCount++
    },

    async loadSettings() {
      return settings ? structuredClone(settings) : null
    },

    async saveSettings(next) {
      if (saveError) throw saveError
      settings = structuredClone(next)
    },
  }
}

// ============================================================================
// Transfer
// ============================================================================

/**
 * Copies every task and the settings from one store to another, replacing
 * what the target held. Returns the number of tasks copied.
 */
export async function transferState(from: Adapter, to: Adapter): Promise<number> {
  const tasks = await from.loadTasks()
  const settings = normalizeSettings(await from.loadSettings())
  await to.saveTasks(tasks)
  await to.saveSettings(settings)
  return tasks.length
}
