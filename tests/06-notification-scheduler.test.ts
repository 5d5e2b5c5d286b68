/**
 * Segment 06: Notification Scheduler Tests
 *
 * One tick at a time against a manual clock: advance and due notifications,
 * recurring advancement, failure handling, the next-wake interval, the purge
 * pass, and the timer loop under fake timers.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  createNotificationScheduler,
  computeNextDelay,
  notificationTitle,
  notificationBody,
  DEFAULT_SCHEDULER_OPTIONS,
  type TickResult,
} from '../src/notification-scheduler'
import { createTaskTracker } from '../src/internal/task-tracker'
import { createMockAdapter } from '../src/adapter'
import { normalizeSettings, type Settings } from '../src/settings'
import { createTask, type Task, type TaskInput } from '../src/task'
import type { RecurrenceRuleInput } from '../src/recurrence-rule'
import {
  datetime,
  createManualClock,
  createRecordingNotifier,
  createTestLogger,
} from './helpers/fixtures'

// ============================================================================
// Test Helpers
// ============================================================================

function setup(settings: Partial<Settings> = {}, start = '2025-01-01T09:00') {
  const clock = createManualClock(start)
  let n = 0
  const tracker = createTaskTracker({ clock, ackMode: 'restart', newId: () => `t${++n}` })
  const adapter = createMockAdapter()
  const notifier = createRecordingNotifier()
  const { logger, entries } = createTestLogger()
  const current = normalizeSettings(settings)
  const ticks: TickResult[] = []
  const purged: string[][] = []
  const scheduler = createNotificationScheduler({
    tracker,
    adapter,
    notifier,
    clock,
    logger,
    getSettings: () => current,
    options: DEFAULT_SCHEDULER_OPTIONS,
    onTick: (r) => ticks.push(r),
    onPurge: (ids) => purged.push(ids),
  })
  return {
    clock,
    tracker,
    adapter,
    notifier,
    entries,
    scheduler,
    ticks,
    purged,
  }
}

const daily: RecurrenceRuleInput = { mode: 'daily' }

/** Task due one hour after 09:00 */
function tenOClock(extra: TaskInput = {}): TaskInput {
  return { start: datetime('2025-01-01T09:00'), duration: { hours: 1 }, ...extra }
}

function taskDueAt(finish: string, patch: Partial<Task> = {}): Task {
  const now = datetime('2025-01-01T09:00')
  return { ...createTask('x', { start: now }, now), finish: datetime(finish), ...patch }
}

afterEach(() => {
  vi.useRealTimers()
})

// ============================================================================
// Tests
// ============================================================================

describe('Segment 06: Notification Scheduler', () => {
  describe('message text', () => {
    it('titles carry the kind and the account', () => {
      expect(notificationTitle('advance', { account: 'Main' })).toBe('[Advance] Main')
      expect(notificationTitle('due', { account: 'Main' })).toBe('[Due] Main')
    })

    it('bodies carry the name and the display finish', () => {
      const finish = datetime('2025-01-01T10:00:30')
      expect(notificationBody('due', { name: 'Barracks', finish })).toBe('Barracks finish 2025-01-01 10:00')
      expect(notificationBody('advance', { name: 'Barracks', finish }))
        .toBe('Barracks finishes soon, finish 2025-01-01 10:00')
    })
  })

  describe('due notifications', () => {
    it('fires once and advances a daily task to the next day', async () => {
      const { clock, tracker, adapter, notifier, scheduler } = setup()
      tracker.add(tenOClock({ recurrence: daily }))
      clock.set('2025-01-01T10:00:01')

      const result = await scheduler.tick()

      expect(notifier.sent).toEqual([{ title: '[Due] Default', body: '- finish 2025-01-01 10:00' }])
      expect(result.occurrences).toEqual([
        { taskId: 't1', outcome: 'scheduled', finish: '2025-01-02T10:00:00', skipped: [] },
      ])
      const task = tracker.get('t1')
      expect(task?.finish).toBe('2025-01-02T10:00:00')
      expect(task?.notified).toBe(false)
      expect(adapter.saveCount).toBe(1)
      expect(result.nextDelayMs).toBe(5000)
    })

    it('leaves a non-repeating task finish alone and fires only once', async () => {
      const { clock, tracker, notifier, scheduler, adapter } = setup()
      tracker.add(tenOClock())
      clock.set('2025-01-01T10:00')

      await scheduler.tick()
      const second = await scheduler.tick()

      expect(notifier.sent).toHaveLength(1)
      expect(second.changed).toBe(false)
      expect(tracker.get('t1')?.finish).toBe('2025-01-01T10:00:00')
      expect(tracker.get('t1')?.notified).toBe(true)
      expect(adapter.saveCount).toBe(1)
    })

    it('does nothing before the finish', async () => {
      const { clock, tracker, notifier, scheduler } = setup()
      tracker.add(tenOClock())
      clock.set('2025-01-01T09:59:59')

      const result = await scheduler.tick()
      expect(notifier.sent).toEqual([])
      expect(result.changed).toBe(false)
    })

    it('never fires a task whose finish saturates at the latest instant', async () => {
      const { clock, tracker, notifier, scheduler } = setup()
      const task = tracker.add({ start: datetime('2025-01-01T09:00'), duration: { days: 3_000_000 } })
      expect(task.finish).toBe('9999-12-31T23:59:59')
      clock.set('2025-01-01T10:00')

      const result = await scheduler.tick()
      expect(notifier.sent).toEqual([])
      expect(result.changed).toBe(false)
    })

    it('ignores tasks marked for deletion', async () => {
      const { clock, tracker, notifier, scheduler } = setup()
      tracker.add(tenOClock())
      tracker.togglePendingDelete('t1')
      clock.set('2025-01-01T10:00')

      await scheduler.tick()
      expect(notifier.sent).toEqual([])
      expect(tracker.get('t1')?.notified).toBe(false)
    })
  })

  describe('advance notifications', () => {
    it('fires the lead-time notification before the finish', async () => {
      const { clock, tracker, notifier, scheduler } = setup({ advanceNotifySeconds: 300 })
      tracker.add(tenOClock())
      clock.set('2025-01-01T09:55')

      const result = await scheduler.tick()

      expect(notifier.sent).toEqual([{ title: '[Advance] Default', body: '- finishes soon, finish 2025-01-01 10:00' }])
      expect(tracker.get('t1')?.advanceNotified).toBe(true)
      expect(tracker.get('t1')?.notified).toBe(false)
      expect(result.nextDelayMs).toBe(5000)
    })

    it('still notifies at due when alsoNotifyAtDue is on', async () => {
      const { clock, tracker, notifier, scheduler } = setup({ advanceNotifySeconds: 300 })
      tracker.add(tenOClock())
      clock.set('2025-01-01T09:55')
      await scheduler.tick()
      clock.set('2025-01-01T10:00')
      await scheduler.tick()

      expect(notifier.sent.map((s) => s.title)).toEqual(['[Advance] Default', '[Due] Default'])
    })

    it('marks the due silently when alsoNotifyAtDue is off', async () => {
      const { clock, tracker, notifier, scheduler } = setup({ advanceNotifySeconds: 300, alsoNotifyAtDue: false })
      tracker.add(tenOClock())
      clock.set('2025-01-01T09:55')
      await scheduler.tick()
      clock.set('2025-01-01T10:00')
      const result = await scheduler.tick()

      expect(notifier.sent).toHaveLength(1)
      expect(result.silenced).toEqual(['t1'])
      expect(tracker.get('t1')?.notified).toBe(true)
    })

    it('a silent due still advances a recurring task', async () => {
      const { clock, tracker, scheduler } = setup({ advanceNotifySeconds: 300, alsoNotifyAtDue: false })
      tracker.add(tenOClock({ recurrence: daily }))
      clock.set('2025-01-01T09:56')
      await scheduler.tick()
      clock.set('2025-01-01T10:00')
      await scheduler.tick()

      const task = tracker.get('t1')
      expect(task?.finish).toBe('2025-01-02T10:00:00')
      expect(task?.advanceNotified).toBe(false)
    })

    it('skips the lead time once the finish has passed', async () => {
      const { clock, tracker, notifier, scheduler } = setup({ advanceNotifySeconds: 300 })
      tracker.add(tenOClock())
      clock.set('2025-01-01T10:00:30')
      await scheduler.tick()

      expect(notifier.sent.map((s) => s.title)).toEqual(['[Due] Default'])
    })
  })

  describe('recurring tasks', () => {
    it('catches up one occurrence per tick after a long sleep', async () => {
      const { clock, tracker, notifier, scheduler } = setup()
      tracker.add(tenOClock({ recurrence: daily }))
      clock.set('2025-01-03T12:00')

      await scheduler.tick()
      expect(tracker.get('t1')?.finish).toBe('2025-01-02T10:00:00')
      await scheduler.tick()
      expect(tracker.get('t1')?.finish).toBe('2025-01-03T10:00:00')
      await scheduler.tick()
      expect(tracker.get('t1')?.finish).toBe('2025-01-04T10:00:00')
      await scheduler.tick()
      expect(notifier.sent).toHaveLength(3)
    })

    it('pauses a task until it is acknowledged', async () => {
      const { clock, tracker, notifier, scheduler } = setup()
      tracker.add(tenOClock({ recurrence: { mode: 'daily', pauseUntilAck: true } }))
      clock.set('2025-01-01T10:00')

      const result = await scheduler.tick()
      expect(result.occurrences[0]?.outcome).toBe('awaitingAck')
      expect(tracker.get('t1')?.awaitingAck).toBe(true)

      clock.set('2025-01-02T10:00:05')
      await scheduler.tick()
      expect(notifier.sent).toHaveLength(1)
    })

    it('fires once when the offset pulls the next occurrence back before the trigger', async () => {
      const { clock, tracker, notifier, scheduler } = setup()
      tracker.add(tenOClock({ recurrence: { mode: 'daily', offsetAfterSeconds: -90_000 } }))
      clock.set('2025-01-01T10:00')

      for (let i = 0; i < 5; i++) {
        await scheduler.tick()
        clock.advance(1)
      }

      expect(notifier.sent).toHaveLength(1)
      expect(tracker.get('t1')?.finish).toBe('2025-01-02T10:00:00')
    })

    it('reports skipped instants', async () => {
      const { clock, tracker, scheduler } = setup()
      tracker.add(tenOClock({ recurrence: { mode: 'daily', skip: { remindEvery: 1, skipCount: 2 } } }))
      clock.set('2025-01-01T10:00')
      await scheduler.tick()
      clock.set('2025-01-02T10:00')

      const result = await scheduler.tick()
      expect(result.occurrences).toEqual([
        {
          taskId: 't1',
          outcome: 'scheduled',
          finish: '2025-01-05T10:00:00',
          skipped: ['2025-01-03T10:00:00', '2025-01-04T10:00:00'],
        },
      ])
    })
  })

  describe('failures', () => {
    it('logs a throwing notifier and still marks the task', async () => {
      const clock = createManualClock('2025-01-01T09:00')
      const tracker = createTaskTracker({ clock, ackMode: 'restart', newId: () => 't1' })
      const { logger, entries } = createTestLogger()
      const scheduler = createNotificationScheduler({
        tracker,
        adapter: createMockAdapter(),
        notifier: { notify: () => { throw new Error('tray unavailable') } },
        clock,
        logger,
        getSettings: () => normalizeSettings(null),
        options: DEFAULT_SCHEDULER_OPTIONS,
      })
      tracker.add(tenOClock())
      clock.set('2025-01-01T10:00')

      const result = await scheduler.tick()

      expect(result.notifications).toHaveLength(1)
      expect(tracker.get('t1')?.notified).toBe(true)
      const error = entries.find((e) => e.level === 'error')
      expect(error?.message).toBe('Notifier failed')
      expect(error?.data).toEqual({ taskId: 't1', kind: 'due' })
    })

    it('logs a failed save without rejecting the tick', async () => {
      const { clock, tracker, adapter, scheduler, entries } = setup()
      tracker.add(tenOClock())
      clock.set('2025-01-01T10:00')
      adapter.failSavesWith(new Error('disk full'))

      const result = await scheduler.tick()

      expect(result.changed).toBe(true)
      const error = entries.find((e) => e.level === 'error')
      expect(error?.message).toBe('Saving tasks failed')
      expect(error?.error?.message).toBe('disk full')
    })
  })

  describe('computeNextDelay', () => {
    const now = datetime('2025-01-01T09:00')
    const settings = normalizeSettings(null)

    it('sleeps the maximum with nothing pending', () => {
      expect(computeNextDelay([], now, settings)).toBe(5000)
    })

    it('wakes the guard ahead of the due instant', () => {
      expect(computeNextDelay([taskDueAt('2025-01-01T09:00:05')], now, settings)).toBe(2000)
    })

    it('uses the minimum when the guarded target is already behind', () => {
      expect(computeNextDelay([taskDueAt('2025-01-01T09:00:02')], now, settings)).toBe(1000)
    })

    it('clamps far instants to the maximum', () => {
      expect(computeNextDelay([taskDueAt('2025-01-01T09:01')], now, settings)).toBe(5000)
    })

    it('considers the advance instant', () => {
      const withLead = normalizeSettings({ advanceNotifySeconds: 60 })
      expect(computeNextDelay([taskDueAt('2025-01-01T09:01:07')], now, withLead)).toBe(4000)
    })

    it('ignores suppressed due instants and inactive tasks', () => {
      const quiet = normalizeSettings({ alsoNotifyAtDue: false, advanceNotifySeconds: 60 })
      expect(computeNextDelay([taskDueAt('2025-01-01T09:00:05', { advanceNotified: true })], now, quiet)).toBe(5000)
      expect(computeNextDelay([taskDueAt('2025-01-01T09:00:05', { pendingDelete: true })], now, settings)).toBe(5000)
      expect(computeNextDelay([taskDueAt('2025-01-01T09:00:05', { awaitingAck: true })], now, settings)).toBe(5000)
    })

    it('honors custom bounds', () => {
      const options = { minIntervalMs: 500, maxIntervalMs: 60000, guardSeconds: 0 }
      expect(computeNextDelay([taskDueAt('2025-01-01T09:00:30')], now, settings, options)).toBe(30000)
    })
  })

  describe('purge', () => {
    it('removes a deleted task after the grace window', async () => {
      const { clock, tracker, scheduler, purged, adapter } = setup()
      tracker.add(tenOClock())
      tracker.togglePendingDelete('t1')

      clock.advance(2)
      expect(await scheduler.purge()).toEqual([])
      clock.advance(1)
      expect(await scheduler.purge()).toEqual(['t1'])

      expect(tracker.list()).toEqual([])
      expect(purged).toEqual([['t1']])
      expect(adapter.saveCount).toBe(1)
    })

    it('force removes inside the grace window', async () => {
      const { tracker, scheduler } = setup()
      tracker.add(tenOClock())
      tracker.togglePendingDelete('t1')
      expect(await scheduler.purge(true)).toEqual(['t1'])
    })
  })

  describe('timer loop', () => {
    it('is not reentrant', async () => {
      const { scheduler } = setup()
      const first = scheduler.tick()
      expect(scheduler.tick()).toBe(first)
      await first
    })

    it('ticks on start and clears its timers on stop', async () => {
      vi.useFakeTimers()
      const { clock, tracker, notifier, scheduler, ticks } = setup()
      tracker.add(tenOClock())
      clock.set('2025-01-01T10:00')

      scheduler.start()
      expect(scheduler.isRunning()).toBe(true)
      await vi.advanceTimersByTimeAsync(0)

      expect(notifier.sent).toHaveLength(1)
      expect(ticks).toHaveLength(1)

      scheduler.stop()
      expect(scheduler.isRunning()).toBe(false)
      expect(vi.getTimerCount()).toBe(0)
    })

    it('sleeps the computed delay between ticks', async () => {
      vi.useFakeTimers()
      const { scheduler, ticks } = setup()
      scheduler.start()
      await vi.advanceTimersByTimeAsync(0)
      expect(ticks).toHaveLength(1)
      await vi.advanceTimersByTimeAsync(4999)
      expect(ticks).toHaveLength(1)
      await vi.advanceTimersByTimeAsync(1)
      expect(ticks).toHaveLength(2)
      scheduler.stop()
    })
  })
})
