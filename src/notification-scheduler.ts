/**
 * Notification Scheduler
 *
 * Cooperative polling loop. Each tick scans the tasks once: it sends advance
 * and due notifications, advances recurring tasks past their due instant, and
 * derives how long to sleep before the next tick. A second, faster loop
 * applies the deletion policy.
 *
 * The timer is not reentrant: a tick that is still saving when the next one is
 * requested hands back the in-flight promise.
 */

import type { LocalDateTime } from './time-date'
import { addSeconds, formatDisplay, secondsBetween } from './time-date'
import type { Task } from './task'
import type { Settings } from './settings'
import { deletionPolicyFor } from './settings'
import type { AdvanceOutcome, OccurrenceState } from './recurrence-engine'
import { advanceOccurrence } from './recurrence-engine'
import type { Adapter } from './adapter'
import type { Clock, Notifier } from './collaborators'
import type { Logger } from './logging'
import type { TaskTracker } from './internal/task-tracker'

// ============================================================================
// Types
// ============================================================================

export type SchedulerOptions = {
  /** Shortest sleep between ticks */
  minIntervalMs: number
  /** Longest sleep between ticks, also used when nothing is pending */
  maxIntervalMs: number
  /** Wake this many seconds before the nearest instant */
  guardSeconds: number
  purgeIntervalMs: number
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  minIntervalMs: 1000,
  maxIntervalMs: 5000,
  guardSeconds: 3,
  purgeIntervalMs: 500,
}

export type NotificationKind = 'advance' | 'due'

export type SentNotification = {
  taskId: string
  kind: NotificationKind
  title: string
  body: string
}

export type OccurrenceChange = {
  taskId: string
  outcome: AdvanceOutcome['kind']
  finish: LocalDateTime
  skipped: LocalDateTime[]
}

export type TickResult = {
  now: LocalDateTime
  notifications: SentNotification[]
  /** Due without a notification: the advance one already covered it */
  silenced: string[]
  occurrences: OccurrenceChange[]
  /** Whether any task changed (and a save was attempted) */
  changed: boolean
  nextDelayMs: number
}

type SchedulerDeps = {
  tracker: TaskTracker
  adapter: Adapter
  notifier: Notifier
  clock: Clock
  logger: Logger
  getSettings: () => Settings
  options: SchedulerOptions
  onTick?: (result: TickResult) => void
  onPurge?: (removedIds: string[]) => void
}

// ============================================================================
// Pure Helpers
// ============================================================================

/** Tasks the scheduler looks at: not withdrawn, not paused for acknowledgement */
export function isActive(task: Pick<Task, 'pendingDelete' | 'awaitingAck'>): boolean {
  return !task.pendingDelete && !task.awaitingAck
}

/** Whether a due notification would be suppressed by an earlier advance one */
function dueSuppressed(task: Pick<Task, 'advanceNotified'>, settings: Settings): boolean {
  return !settings.alsoNotifyAtDue && task.advanceNotified
}

export function notificationTitle(kind: NotificationKind, task: Pick<Task, 'account'>): string {
  return kind === 'advance' ? `[Advance] ${task.account}` : `[Due] ${task.account}`
}

export function notificationBody(kind: NotificationKind, task: Pick<Task, 'name' | 'finish'>): string {
  const finish = formatDisplay(task.finish)
  return kind === 'advance' ? `${task.name} finishes soon, finish ${finish}` : `${task.name} finish ${finish}`
}

/** Nearest unfired advance or due instant strictly after `now`, or null */
export function nextWakeInstant(tasks: readonly Task[], now: LocalDateTime, settings: Settings): LocalDateTime | null {
  const adv = settings.advanceNotifySeconds
  let next: LocalDateTime | null = null

  for (const task of tasks) {
    if (!isActive(task)) continue

    if (adv > 0 && !task.advanceNotified) {
      const advanceAt = addSeconds(task.finish, -adv)
      if (advanceAt > now && (next === null || advanceAt < next)) next = advanceAt
    }

    if (!task.notified && !dueSuppressed(task, settings) && task.finish > now) {
      if (next === null || task.finish < next) next = task.finish
    }
  }

  return next
}

/**
 * Sleep before the next tick: wake `guardSeconds` ahead of the nearest
 * instant, clamped to [min, max]. A target already behind `now` means check
 * again after the minimum interval.
 */
export function computeNextDelay(
  tasks: readonly Task[],
  now: LocalDateTime,
  settings: Settings,
  options: Pick<SchedulerOptions, 'minIntervalMs' | 'maxIntervalMs' | 'guardSeconds'> = DEFAULT_SCHEDULER_OPTIONS
): number {
  const next = nextWakeInstant(tasks, now, settings)
  if (next === null) return options.maxIntervalMs

  const target = addSeconds(next, -options.guardSeconds)
  const deltaMs = target < now ? options.minIntervalMs : secondsBetween(now, target) * 1000
  return Math.min(options.maxIntervalMs, Math.max(options.minIntervalMs, deltaMs))
}

// ============================================================================
// Factory
// ============================================================================

export function createNotificationScheduler(deps: SchedulerDeps) {
  const { tracker, adapter, notifier, clock, logger, getSettings, options } = deps

  let tickTimer: ReturnType<typeof setTimeout> | null = null
  let purgeTimer: ReturnType<typeof setInterval> | null = null
  let inFlight: Promise<TickResult> | null = null
  let purging = false
  let running = false

  // ========== Side Effects ==========

  function send(kind: NotificationKind, task: Task, sent: SentNotification[]): void {
    const title = notificationTitle(kind, task)
    const body = notificationBody(kind, task)
    try {
      notifier.notify(title, body)
      logger.info('Notification sent', { taskId: task.id, kind })
    } catch (err) {
      logger.error('Notifier failed', err, { taskId: task.id, kind })
    }
    sent.push({ taskId: task.id, kind, title, body })
  }

  async function save(): Promise<void> {
    try {
      await adapter.saveTasks(tracker.list())
    } catch (err) {
      logger.error('Saving tasks failed', err)
    }
  }

  // ========== Tick ==========

  async function runTick(): Promise<TickResult> {
    const now = clock.now()
    const settings = getSettings()
    const adv = settings.advanceNotifySeconds
    const notifications: SentNotification[] = []
    const silenced: string[] = []
    const occurrences: OccurrenceChange[] = []
    let changed = false

    for (const task of tracker.list()) {
      if (!isActive(task)) continue

      let advanceNotified = task.advanceNotified
      if (adv > 0 && !advanceNotified && task.finish > now && addSeconds(task.finish, -adv) <= now) {
        send('advance', task, notifications)
        advanceNotified = true
        tracker.patch(task.id, { advanceNotified })
        changed = true
      }

      if (task.finish > now || task.notified) continue

      if (dueSuppressed({ advanceNotified }, settings)) {
        silenced.push(task.id)
      } else {
        send('due', task, notifications)
      }

      let state: OccurrenceState = {
        finish: task.finish,
        cursor: task.cursor,
        notified: true,
        advanceNotified,
        awaitingAck: task.awaitingAck,
        expired: task.expired,
      }

      if (task.recurrence && !task.expired) {
        const outcome = advanceOccurrence(state, task.recurrence)
        state = outcome.state
        occurrences.push({ taskId: task.id, outcome: outcome.kind, finish: state.finish, skipped: outcome.skipped })
        logger.debug('Occurrence advanced', { taskId: task.id, outcome: outcome.kind, finish: state.finish })
      }

      tracker.patch(task.id, state)
      changed = true
    }

    if (changed) await save()

    const result: TickResult = {
      now,
      notifications,
      silenced,
      occurrences,
      changed,
      nextDelayMs: computeNextDelay(tracker.list(), clock.now(), settings, options),
    }
    logger.debug('Tick', { notifications: notifications.length, nextDelayMs: result.nextDelayMs })
    deps.onTick?.(result)
    return result
  }

  function tick(): Promise<TickResult> {
    if (inFlight) return inFlight
    inFlight = runTick().finally(() => {
      inFlight = null
    })
    return inFlight
  }

  // ========== Purge ==========

  async function purge(force = false): Promise<string[]> {
    const removed = tracker.purge(deletionPolicyFor(getSettings()), force)
    if (removed.length > 0) {
      logger.debug('Purged tasks', { count: removed.length })
      await save()
      deps.onPurge?.(removed)
    }
    return removed
  }

  // ========== Timer Loop ==========

  function schedule(delayMs: number): void {
    if (!running) return
    tickTimer = setTimeout(() => {
      tickTimer = null
      void tick()
        .then((result) => schedule(result.nextDelayMs))
        .catch((err: unknown) => {
          logger.error('Tick failed', err)
          schedule(options.maxIntervalMs)
        })
    }, delayMs)
  }

  function purgeLoop(): void {
    if (purging) return
    purging = true
    void purge(false)
      .catch((err: unknown) => logger.error('Purge failed', err))
      .finally(() => {
        purging = false
      })
  }

  function start(): void {
    if (running) return
    running = true
    schedule(0)
    purgeTimer = setInterval(purgeLoop, options.purgeIntervalMs)
  }

  function stop(): void {
    running = false
    if (tickTimer) clearTimeout(tickTimer)
    if (purgeTimer) clearInterval(purgeTimer)
    tickTimer = null
    purgeTimer = null
  }

  /** Runs a tick now and restarts the sleep from its result */
  async function reschedule(): Promise<TickResult> {
    if (tickTimer) {
      clearTimeout(tickTimer)
      tickTimer = null
    }
    const result = await tick()
    if (running && !tickTimer) schedule(result.nextDelayMs)
    return result
  }

  return {
    tick,
    purge,
    start,
    stop,
    reschedule,
    isRunning: () => running,
  }
}

export type NotificationScheduler = ReturnType<typeof createNotificationScheduler>
