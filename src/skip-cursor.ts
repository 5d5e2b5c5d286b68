/**
 * Skip Cursor Module
 *
 * Tracks how many occurrences a recurring task has passed through
 * (`occurrenceCursor`, skipped ones included) against how many actually
 * notified the user (`notifyCount`). Invariant: cursor ≥ notifyCount ≥ 0.
 */

import type { SkipRule } from './recurrence-rule'

// ============================================================================
// Types
// ============================================================================

export type SkipCursor = {
  occurrenceCursor: number
  notifyCount: number
}

// ============================================================================
// Public API
// ============================================================================

export function initialCursor(): SkipCursor {
  return { occurrenceCursor: 0, notifyCount: 0 }
}

/**
 * Whether occurrence number `cursor` (1-indexed) notifies. Within each cycle of
 * `remindEvery + skipCount` occurrences, the first `remindEvery` notify.
 */
export function isNotifyOccurrence(cursor: number, skip: SkipRule | null): boolean {
  if (!skip) return true
  const cycle = skip.remindEvery + skip.skipCount
  const position = (((cursor - 1) % cycle) + cycle) % cycle + 1
  return position <= skip.remindEvery
}

/** Closed form for the number of notify occurrences among cursors 1..n */
export function countNotifyOccurrences(n: number, skip: SkipRule | null): number {
  if (n <= 0) return 0
  if (!skip) return n
  const cycle = skip.remindEvery + skip.skipCount
  return Math.floor(n / cycle) * skip.remindEvery + Math.min(n % cycle, skip.remindEvery)
}

export function isValidCursor(cursor: SkipCursor): boolean {
  return Number.isInteger(cursor.occurrenceCursor) && Number.isInteger(cursor.notifyCount) &&
    cursor.notifyCount >= 0 && cursor.occurrenceCursor >= cursor.notifyCount
}

/** Repairs a persisted cursor that violates the invariant */
export function normalizeCursor(cursor: Partial<SkipCursor> | null | undefined): SkipCursor {
  const occurrenceCursor = count(cursor?.occurrenceCursor)
  const notifyCount = Math.min(occurrenceCursor, count(cursor?.notifyCount))
  return { occurrenceCursor, notifyCount }
}

function count(n: number | undefined): number {
  return n !== undefined && Number.isFinite(n) && n > 0 ? Math.floor(n) : 0
}
