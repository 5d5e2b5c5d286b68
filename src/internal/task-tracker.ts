/**
 * Task Tracker
 *
 * Stateful task collection. Owns the task Map and the display order, and
 * applies user mutations (add, edit, done, delete, acknowledge, reorder).
 * It is the single writer of task state: the notification scheduler writes
 * occurrence changes back through `patch`.
 *
 * Persistence and event emission are handled by the orchestrator.
 */

import { randomUUID } from 'node:crypto'
import type { Clock } from '../collaborators'
import type { Task, TaskInput } from '../task'
import { cloneTask, createTask, editTask } from '../task'
import type { AckMode, OccurrenceState } from '../recurrence-engine'
import { acknowledgeOccurrence } from '../recurrence-engine'
import type { DeletionPolicy } from '../deletion-policy'
import { insertByFinish, sortByFinish } from '../finish-order'
import { normalizeCursor } from '../skip-cursor'
import { NotFoundError, ValidationError } from '../errors'

// ============================================================================
// Types
// ============================================================================

/** `finish`: ordered by due instant; `custom`: user-arranged */
export type SortMode = 'finish' | 'custom'

export type TaskTrackerDeps = {
  clock: Clock
  ackMode: AckMode
  newId?: () => string
}

export type TaskTracker = ReturnType<typeof createTaskTracker>

// ============================================================================
// Factory
// ============================================================================

export function createTaskTracker(deps: TaskTrackerDeps) {
  const { clock, ackMode } = deps
  const newId = deps.newId ?? randomUUID

  const tasks = new Map<string, Task>()
  let order: string[] = []
  let sortMode: SortMode = 'finish'

  // ========== Helpers ==========

  function requireTask(id: string): Task {
    const task = tasks.get(id)
    if (!task) throw new NotFoundError(`Task '${id}' not found`)
    return task
  }

  function ordered(): Task[] {
    const out: Task[] = []
    for (const id of order) {
      const task = tasks.get(id)
      if (task) out.push(task)
    }
    return out
  }

  function resort(): void {
    order = sortByFinish(ordered()).map((t) => t.id)
  }

  /** Places a task in the order according to the current sort mode */
  function place(task: Task): void {
    order = order.filter((id) => id !== task.id)
    if (sortMode === 'finish') {
      const list = ordered()
      const index = insertByFinish(list, task)
      order.splice(index, 0, task.id)
    } else {
      order.push(task.id)
    }
  }

  function store(task: Task): Task {
    tasks.set(task.id, task)
    return cloneTask(task)
  }

  // ========== Loading ==========

  /** Replaces the collection with persisted tasks; stored order survives only in custom mode */
  function hydrate(loaded: readonly Task[]): void {
    tasks.clear()
    order = []
    for (const task of loaded) {
      if (tasks.has(task.id)) continue
      tasks.set(task.id, { ...cloneTask(task), cursor: normalizeCursor(task.cursor) })
      order.push(task.id)
    }
    if (sortMode === 'finish') resort()
  }

  /** Clones of every task in display order */
  function list(): Task[] {
    return ordered().map(cloneTask)
  }

  function get(id: string): Task | null {
    const task = tasks.get(id)
    return task ? cloneTask(task) : null
  }

  // ========== User Mutations ==========

  function add(input: TaskInput): Task {
    const task = createTask(newId(), input, clock.now())
    tasks.set(task.id, task)
    place(task)
    return cloneTask(task)
  }

  function update(id: string, input: TaskInput): Task {
    const task = editTask(requireTask(id), input, clock.now())
    tasks.set(id, task)
    // Custom order keeps the edited task where the user put it
    if (sortMode === 'finish') place(task)
    return cloneTask(task)
  }

  function acknowledge(id: string): Task {
    const task = requireTask(id)
    if (!task.recurrence || !task.awaitingAck) return cloneTask(task)
    const state = acknowledgeOccurrence(task, task.recurrence, clock.now(), ackMode)
    const next = { ...task, ...state }
    tasks.set(id, next)
    if (sortMode === 'finish') place(next)
    return cloneTask(next)
  }

  /** On a task paused for acknowledgement this acknowledges instead */
  function toggleDone(id: string): Task {
    const task = requireTask(id)
    if (task.awaitingAck) return acknowledge(id)
    const done = !task.done
    return store({ ...task, done, completedAt: done ? clock.now() : null })
  }

  /** Marks a task for deletion, or takes the mark back within the grace window */
  function togglePendingDelete(id: string): Task {
    const task = requireTask(id)
    const pendingDelete = !task.pendingDelete
    return store({ ...task, pendingDelete, deleteMarkedAt: pendingDelete ? clock.now() : null })
  }

  function removeAllDone(): string[] {
    const removed = ordered().filter((t) => t.done).map((t) => t.id)
    remove(removed)
    return removed
  }

  function purge(policy: DeletionPolicy, force: boolean): string[] {
    const now = clock.now()
    const removed = ordered().filter((t) => policy.shouldPurge(t, now, force)).map((t) => t.id)
    remove(removed)
    if (removed.length > 0 && sortMode === 'finish') resort()
    return removed
  }

  function remove(ids: readonly string[]): void {
    if (ids.length === 0) return
    const gone = new Set(ids)
    for (const id of ids) tasks.delete(id)
    order = order.filter((id) => !gone.has(id))
  }

  // ========== Ordering ==========

  function getSortMode(): SortMode {
    return sortMode
  }

  function setSortMode(mode: SortMode): void {
    sortMode = mode
    if (mode === 'finish') resort()
  }

  /** Moves a task to `toIndex` (clamped); switches the list to custom order */
  function move(id: string, toIndex: number): void {
    requireTask(id)
    if (!Number.isInteger(toIndex)) throw new ValidationError(`Index must be an integer, got ${toIndex}`)
    sortMode = 'custom'
    order = order.filter((o) => o !== id)
    const index = Math.max(0, Math.min(toIndex, order.length))
    order.splice(index, 0, id)
  }

  // ========== Scheduler Write-Back ==========

  /** Writes occurrence changes computed by the scheduler back into the task */
  function patch(id: string, changes: Partial<OccurrenceState>): Task {
    const previous = requireTask(id)
    const task = { ...previous, ...changes }
    tasks.set(id, task)
    if (task.finish !== previous.finish && sortMode === 'finish') place(task)
    return cloneTask(task)
  }

  return {
    hydrate,
    list,
    get,
    add,
    update,
    acknowledge,
    toggleDone,
    togglePendingDelete,
    removeAllDone,
    purge,
    getSortMode,
    setSortMode,
    move,
    patch,
  }
}
