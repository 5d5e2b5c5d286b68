/**
 * Public API Module
 *
 * Consumer-facing interface that ties all components together.
 * Handles initialization, config validation, persistence of user mutations,
 * the background scheduler, and event emission.
 */

import type { Adapter } from './adapter'
import type { Task, TaskInput } from './task'
import type { Settings } from './settings'
import { normalizeSettings } from './settings'
import type { AckMode, RecurrenceState } from './recurrence-engine'
import { recurrenceState } from './recurrence-engine'
import type { Clock, Notifier } from './collaborators'
import { createLogNotifier, systemClock } from './collaborators'
import type { Logger } from './logging'
import { createLogger } from './logging'
import type { SchedulerOptions, SentNotification, OccurrenceChange, TickResult } from './notification-scheduler'
import { DEFAULT_SCHEDULER_OPTIONS, createNotificationScheduler } from './notification-scheduler'
import type { SortMode } from './internal/task-tracker'
import { createTaskTracker } from './internal/task-tracker'
import { ValidationError } from './errors'

export { ValidationError, NotFoundError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type { Adapter } from './adapter'
export type { SortMode } from './internal/task-tracker'

export type UpgradeTimersConfig = {
  adapter: Adapter
  /** Defaults to writing notifications to the logger */
  notifier?: Notifier
  clock?: Clock
  logger?: Logger
  scheduler?: Partial<SchedulerOptions>
  /** How acknowledging a paused recurring task resumes it; defaults to `restart` */
  ackMode?: AckMode
  /** Id source for new tasks; defaults to random UUIDs */
  newId?: () => string
}

export type UpgradeTimersEvents = {
  notification: SentNotification
  occurrence: OccurrenceChange
  purged: string[]
  tick: TickResult
}

export type UpgradeTimersEvent = keyof UpgradeTimersEvents

export type UpgradeTimers = {
  hydrate(): Promise<void>

  addTask(input: TaskInput): Promise<Task>
  updateTask(id: string, input: TaskInput): Promise<Task>
  getTask(id: string): Task | null
  listTasks(): Task[]
  getTaskState(id: string): RecurrenceState | null
  toggleDone(id: string): Promise<Task>
  togglePendingDelete(id: string): Promise<Task>
  acknowledge(id: string): Promise<Task>
  removeAllDone(): Promise<string[]>
  purge(force?: boolean): Promise<string[]>

  getSortMode(): SortMode
  setSortMode(mode: SortMode): Promise<void>
  moveTask(id: string, toIndex: number): Promise<void>

  getSettings(): Settings
  updateSettings(changes: Partial<Settings>): Promise<Settings>

  tick(): Promise<TickResult>
  start(): void
  stop(): void
  isRunning(): boolean
  close(): Promise<void>

  on<K extends UpgradeTimersEvent>(event: K, handler: (payload: UpgradeTimersEvents[K]) => void): void
}

// ============================================================================
// Helpers
// ============================================================================

function resolveSchedulerOptions(input: Partial<SchedulerOptions> | undefined): SchedulerOptions {
  const options: SchedulerOptions = { ...DEFAULT_SCHEDULER_OPTIONS }
  for (const key of ['minIntervalMs', 'maxIntervalMs', 'guardSeconds', 'purgeIntervalMs'] as const) {
    const value = input?.[key]
    if (value === undefined) continue
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`scheduler.${key} must be a non-negative integer, got ${value}`)
    }
    options[key] = value
  }
  if (options.minIntervalMs > options.maxIntervalMs) {
    throw new ValidationError(
      `scheduler.minIntervalMs (${options.minIntervalMs}) exceeds maxIntervalMs (${options.maxIntervalMs})`
    )
  }
  if (options.purgeIntervalMs === 0) {
    throw new ValidationError('scheduler.purgeIntervalMs must be positive')
  }
  return options
}

// ============================================================================
// Implementation
// ============================================================================

export function createUpgradeTimers(config: UpgradeTimersConfig): UpgradeTimers {
  if (!config.adapter || typeof config.adapter !== 'object') {
    throw new ValidationError('Adapter is required')
  }
  const ackMode = config.ackMode ?? 'restart'
  if (ackMode !== 'restart' && ackMode !== 'resume') {
    throw new ValidationError(`Invalid ackMode: ${String(ackMode)}`)
  }

  const adapter = config.adapter
  const clock = config.clock ?? systemClock
  const logger = config.logger ?? createLogger('upgrade-timers')
  const notifier = config.notifier ?? createLogNotifier(logger.child('notifier'))
  const options = resolveSchedulerOptions(config.scheduler)

  let settings = normalizeSettings(null)

  // Event handlers
  const eventHandlers: { [K in UpgradeTimersEvent]: Array<(payload: UpgradeTimersEvents[K]) => void> } = {
    notification: [],
    occurrence: [],
    purged: [],
    tick: [],
  }

  function emit<K extends UpgradeTimersEvent>(event: K, payload: UpgradeTimersEvents[K]): boolean {
    let hadErrors = false
    for (const handler of eventHandlers[event]) {
      try { handler(payload) } catch (e) { hadErrors = true; logger.error(`Event handler error on '${event}'`, e) }
    }
    return !hadErrors
  }

  function on<K extends UpgradeTimersEvent>(event: K, handler: (payload: UpgradeTimersEvents[K]) => void): void {
    eventHandlers[event].push(handler)
  }

  const tracker = createTaskTracker({
    clock,
    ackMode,
    ...(config.newId !== undefined ? { newId: config.newId } : {}),
  })

  const scheduler = createNotificationScheduler({
    tracker,
    adapter,
    notifier,
    clock,
    logger: logger.child('scheduler'),
    getSettings: () => settings,
    options,
    onTick(result) {
      for (const n of result.notifications) emit('notification', n)
      for (const o of result.occurrences) emit('occurrence', o)
      emit('tick', result)
    },
    onPurge(removed) {
      emit('purged', removed)
    },
  })

  // ========== Persistence ==========

  async function persistTasks(): Promise<void> {
    try {
      await adapter.saveTasks(tracker.list())
    } catch (err) {
      logger.error('Saving tasks failed', err)
    }
  }

  async function persistSettings(): Promise<void> {
    try {
      await adapter.saveSettings(settings)
    } catch (err) {
      logger.error('Saving settings failed', err)
    }
  }

  // ========== Initialization ==========

  async function hydrate(): Promise<void> {
    settings = normalizeSettings(await adapter.loadSettings())
    tracker.hydrate(await adapter.loadTasks())
    logger.info('Hydrated', { tasks: tracker.list().length })
  }

  // ========== Tasks ==========

  async function addTask(input: TaskInput): Promise<Task> {
    const task = tracker.add(input)
    await persistTasks()
    return task
  }

  async function updateTask(id: string, input: TaskInput): Promise<Task> {
    const task = tracker.update(id, input)
    await persistTasks()
    return task
  }

  function getTaskState(id: string): RecurrenceState | null {
    const task = tracker.get(id)
    return task ? recurrenceState(task, clock.now()) : null
  }

  async function toggleDone(id: string): Promise<Task> {
    const task = tracker.toggleDone(id)
    await persistTasks()
    return task
  }

  async function togglePendingDelete(id: string): Promise<Task> {
    const task = tracker.togglePendingDelete(id)
    await persistTasks()
    return task
  }

  async function acknowledge(id: string): Promise<Task> {
    const task = tracker.acknowledge(id)
    await persistTasks()
    return task
  }

  async function removeAllDone(): Promise<string[]> {
    const removed = tracker.removeAllDone()
    if (removed.length > 0) {
      await persistTasks()
      emit('purged', removed)
    }
    return removed
  }

  // ========== Ordering ==========

  async function setSortMode(mode: SortMode): Promise<void> {
    tracker.setSortMode(mode)
    await persistTasks()
  }

  async function moveTask(id: string, toIndex: number): Promise<void> {
    tracker.move(id, toIndex)
    await persistTasks()
  }

  // ========== Settings ==========

  async function updateSettings(changes: Partial<Settings>): Promise<Settings> {
    const previous = settings
    settings = normalizeSettings({ ...settings, ...changes })
    await persistSettings()
    // Re-check at once so a lead time that already passed is not missed
    if (settings.advanceNotifySeconds !== previous.advanceNotifySeconds) {
      await scheduler.reschedule()
    }
    return structuredClone(settings)
  }

  // ========== Lifecycle ==========

  async function close(): Promise<void> {
    scheduler.stop()
    await adapter.close?.()
  }

  return {
    hydrate,
    addTask,
    updateTask,
    getTask: tracker.get,
    listTasks: tracker.list,
    getTaskState,
    toggleDone,
    togglePendingDelete,
    acknowledge,
    removeAllDone,
    purge: scheduler.purge,
    getSortMode: tracker.getSortMode,
    setSortMode,
    moveTask,
    getSettings: () => structuredClone(settings),
    updateSettings,
    tick: scheduler.tick,
    start: scheduler.start,
    stop: scheduler.stop,
    isRunning: scheduler.isRunning,
    close,
    on,
  }
}
