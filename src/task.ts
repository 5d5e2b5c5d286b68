/**
 * Task Model
 *
 * One trackable upgrade timer. `finish` is always `start + duration`, except
 * where recurrence advancement moves it forward.
 */

import type { LocalDateTime } from './time-date'
import { addSeconds } from './time-date'
import type { RecurrenceRule, RecurrenceRuleInput } from './recurrence-rule'
import { createRecurrenceRule, sameRecurrenceRule } from './recurrence-rule'
import type { SkipCursor } from './skip-cursor'
import { initialCursor } from './skip-cursor'
import { ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_ACCOUNT = 'Default'
export const DEFAULT_TASK_NAME = '-'

/** Duration as entered by the user */
export type TaskDuration = {
  days: number
  hours: number
  minutes: number
}

export type Task = {
  id: string
  account: string
  name: string
  start: LocalDateTime | null
  duration: TaskDuration
  finish: LocalDateTime
  /** Due notification sent for the current occurrence */
  notified: boolean
  /** Advance notification sent for the current occurrence */
  advanceNotified: boolean
  /** Paused after a trigger until the user acknowledges */
  awaitingAck: boolean
  /** End instant reached; no further rescheduling */
  expired: boolean
  done: boolean
  completedAt: LocalDateTime | null
  pendingDelete: boolean
  deleteMarkedAt: LocalDateTime | null
  recurrence: RecurrenceRule | null
  cursor: SkipCursor
}

export type TaskInput = {
  account?: string
  name?: string
  start?: LocalDateTime | null
  duration?: Partial<TaskDuration>
  recurrence?: RecurrenceRuleInput | null
}

// ============================================================================
// Helpers
// ============================================================================

function durationField(input: Partial<TaskDuration> | undefined, key: keyof TaskDuration): number {
  const v = input?.[key] ?? 0
  if (!Number.isInteger(v) || v < 0) {
    throw new ValidationError(`duration.${key} must be a non-negative integer, got ${v}`)
  }
  return v
}

export function toTaskDuration(input: Partial<TaskDuration> | undefined): TaskDuration {
  return {
    days: durationField(input, 'days'),
    hours: durationField(input, 'hours'),
    minutes: durationField(input, 'minutes'),
  }
}

/** `start + duration`; a missing start counts from `now` */
export function computeFinish(start: LocalDateTime | null, duration: TaskDuration, now: LocalDateTime): LocalDateTime {
  const seconds = ((duration.days * 24 + duration.hours) * 60 + duration.minutes) * 60
  return addSeconds(start ?? now, seconds)
}

function sameDuration(a: TaskDuration, b: TaskDuration): boolean {
  return a.days === b.days && a.hours === b.hours && a.minutes === b.minutes
}

function textOr(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim()
  return trimmed ? trimmed : fallback
}

// ============================================================================
// Construction
// ============================================================================

export function createTask(id: string, input: TaskInput, now: LocalDateTime): Task {
  const duration = toTaskDuration(input.duration)
  const start = input.start ?? now
  return {
    id,
    account: textOr(input.account, DEFAULT_ACCOUNT),
    name: textOr(input.name, DEFAULT_TASK_NAME),
    start,
    duration,
    finish: computeFinish(start, duration, now),
    notified: false,
    advanceNotified: false,
    awaitingAck: false,
    expired: false,
    done: false,
    completedAt: null,
    pendingDelete: false,
    deleteMarkedAt: null,
    recurrence: createRecurrenceRule(input.recurrence),
    cursor: initialCursor(),
  }
}

/**
 * Applies a user edit. Account and name changes leave the occurrence state
 * alone. When start, duration or rule actually change, the finish is
 * recomputed and the notification flags and skip cursor start over.
 */
export function editTask(task: Task, input: TaskInput, now: LocalDateTime): Task {
  const account = input.account !== undefined ? textOr(input.account, DEFAULT_ACCOUNT) : task.account
  const name = input.name !== undefined ? textOr(input.name, DEFAULT_TASK_NAME) : task.name
  const start = input.start !== undefined ? input.start : task.start
  const duration = input.duration !== undefined ? toTaskDuration(input.duration) : task.duration
  const recurrence = input.recurrence !== undefined ? createRecurrenceRule(input.recurrence) : task.recurrence

  const timingUnchanged = start === task.start &&
    sameDuration(duration, task.duration) &&
    sameRecurrenceRule(recurrence, task.recurrence)
  if (timingUnchanged) return { ...task, account, name }

  const effectiveStart = start ?? now
  return {
    ...task,
    account,
    name,
    start: effectiveStart,
    duration,
    finish: computeFinish(effectiveStart, duration, now),
    notified: false,
    advanceNotified: false,
    awaitingAck: false,
    expired: false,
    recurrence,
    cursor: initialCursor(),
  }
}

export function cloneTask(task: Task): Task {
  return structuredClone(task)
}
