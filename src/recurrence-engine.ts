/**
 * Recurrence Engine
 *
 * Advances a repeating task to its next occurrence. Pure functions over the
 * occurrence-related slice of a task; callers merge the returned state back.
 *
 * Occurrence `c` (the value of the cursor after incrementing) is the instant
 * `c` periods after the original finish. Skip occurrences are jumped over in
 * the same advance, so a chain of skips never surfaces to the user.
 */

import type { LocalDateTime } from './time-date'
import { addSeconds } from './time-date'
import type { RecurrenceRule } from './recurrence-rule'
import { addPeriod } from './recurrence-rule'
import { isNotifyOccurrence } from './skip-cursor'
import type { Task } from './task'

// ============================================================================
// Types
// ============================================================================

export type RecurrenceState = 'inactive' | 'scheduled' | 'due' | 'awaitingAck' | 'expired'

export type OccurrenceState = Pick<Task, 'finish' | 'cursor' | 'notified' | 'advanceNotified' | 'awaitingAck' | 'expired'>

export type AdvanceOutcome = {
  kind: 'scheduled' | 'awaitingAck' | 'expired'
  state: OccurrenceState
  /** Instants jumped over by skip occurrences, in order */
  skipped: LocalDateTime[]
}

/**
 * How acknowledging a paused task resumes it:
 * - `restart`: the next occurrence is one period (plus offset) after the acknowledgement
 * - `resume`: keep the occurrence computed when the task triggered
 */
export type AckMode = 'restart' | 'resume'

// ============================================================================
// Public API
// ============================================================================

/** One period after `from`, shifted by the rule's offset */
export function nextOccurrence(from: LocalDateTime, rule: RecurrenceRule): LocalDateTime {
  const raw = addPeriod(from, rule.period)
  return rule.offsetAfterSeconds === 0 ? raw : addSeconds(raw, rule.offsetAfterSeconds)
}

/**
 * The occurrence after `from`, strictly later than it. An offset that would
 * pull the instant back to or before `from` is dropped. `null` when no later
 * instant is representable.
 */
export function followingOccurrence(from: LocalDateTime, rule: RecurrenceRule): LocalDateTime | null {
  const shifted = nextOccurrence(from, rule)
  if (shifted > from) return shifted
  const raw = addPeriod(from, rule.period)
  return raw > from ? raw : null
}

export function reachesEnd(instant: LocalDateTime, rule: RecurrenceRule): boolean {
  return rule.endAt !== null && instant >= rule.endAt
}

export function recurrenceState(task: Task, now: LocalDateTime): RecurrenceState {
  if (!task.recurrence) return 'inactive'
  if (task.expired) return 'expired'
  if (task.awaitingAck) return 'awaitingAck'
  return task.finish <= now ? 'due' : 'scheduled'
}

/**
 * Advance after the task's current occurrence triggered. Increments the cursor
 * once per period stepped over; stops at the first notify occurrence or when
 * the end instant is reached.
 */
export function advanceOccurrence(state: OccurrenceState, rule: RecurrenceRule): AdvanceOutcome {
  const trigger = state.finish
  const skipped: LocalDateTime[] = []
  let occurrenceCursor = state.cursor.occurrenceCursor
  let finish = trigger

  for (;;) {
    occurrenceCursor++
    const notify = isNotifyOccurrence(occurrenceCursor, rule.skip)
    const next = followingOccurrence(finish, rule)

    if (next === null || reachesEnd(next, rule)) {
      return {
        kind: 'expired',
        state: {
          ...state,
          cursor: { occurrenceCursor, notifyCount: state.cursor.notifyCount },
          finish: trigger,
          awaitingAck: false,
          expired: true,
        },
        skipped,
      }
    }

    finish = next
    if (notify) {
      return {
        kind: rule.pauseUntilAck ? 'awaitingAck' : 'scheduled',
        state: {
          finish,
          cursor: { occurrenceCursor, notifyCount: state.cursor.notifyCount + 1 },
          notified: false,
          advanceNotified: false,
          awaitingAck: rule.pauseUntilAck,
          expired: false,
        },
        skipped,
      }
    }

    skipped.push(finish)
  }
}

/**
 * User confirmation on a paused task. The cursor stays where the triggering
 * advance left it. A state that is not awaiting acknowledgement is returned
 * unchanged.
 */
export function acknowledgeOccurrence(
  state: OccurrenceState,
  rule: RecurrenceRule,
  now: LocalDateTime,
  mode: AckMode
): OccurrenceState {
  if (!state.awaitingAck) return state

  if (mode === 'resume') {
    return { ...state, awaitingAck: false }
  }

  const next = followingOccurrence(now, rule)
  if (next === null || reachesEnd(next, rule)) {
    return { ...state, awaitingAck: false, expired: true, notified: true }
  }
  return { ...state, finish: next, awaitingAck: false, notified: false, advanceNotified: false }
}
