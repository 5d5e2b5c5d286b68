/**
 * Recurrence Rule Module
 *
 * A task's repeat configuration. The flat `RecurrenceRuleInput` is the shape
 * the UI edits and persistence stores; `createRecurrenceRule` normalizes it into
 * a `RecurrenceRule` whose period is a tagged variant. A `none` mode or an
 * all-zero custom period yields `null`, so an empty custom period never exists
 * as a rule value. A skip rule with only one positive side is dropped.
 */

import type { LocalDateTime } from './time-date'
import { addDaysToDateTime, addMonths, addSeconds, addYears } from './time-date'
import { normalizeYmdhms } from './duration'

// ============================================================================
// Types
// ============================================================================

export const RECURRENCE_MODES = ['none', 'daily', 'weekly', 'monthly', 'yearly', 'custom'] as const
export type RecurrenceMode = (typeof RECURRENCE_MODES)[number]

export type PresetKind = 'daily' | 'weekly' | 'monthly' | 'yearly'

export type CustomPeriod = {
  years: number
  months: number
  days: number
  hours: number
  minutes: number
  seconds: number
}

export type RecurrencePeriod =
  | { kind: 'preset'; preset: PresetKind }
  | { kind: 'custom'; period: CustomPeriod }

/** Notify `remindEvery` times, then silently skip `skipCount` times */
export type SkipRule = {
  remindEvery: number
  skipCount: number
}

export type RecurrenceRule = {
  period: RecurrencePeriod
  endAt: LocalDateTime | null
  skip: SkipRule | null
  pauseUntilAck: boolean
  offsetAfterSeconds: number
}

export type RecurrenceRuleInput = {
  mode: RecurrenceMode
  custom?: Partial<CustomPeriod> | null
  endAt?: LocalDateTime | null
  skip?: Partial<SkipRule> | null
  pauseUntilAck?: boolean
  offsetAfterSeconds?: number
}

// ============================================================================
// Helpers
// ============================================================================

function nonNegativeInt(n: number | undefined): number {
  return n !== undefined && Number.isFinite(n) && n > 0 ? Math.floor(n) : 0
}

export function isRecurrenceMode(value: unknown): value is RecurrenceMode {
  return typeof value === 'string' && (RECURRENCE_MODES as readonly string[]).includes(value)
}

export function toCustomPeriod(input: Partial<CustomPeriod> | null | undefined): CustomPeriod {
  return {
    years: nonNegativeInt(input?.years),
    months: nonNegativeInt(input?.months),
    days: nonNegativeInt(input?.days),
    hours: nonNegativeInt(input?.hours),
    minutes: nonNegativeInt(input?.minutes),
    seconds: nonNegativeInt(input?.seconds),
  }
}

export function isEmptyPeriod(p: CustomPeriod): boolean {
  return p.years === 0 && p.months === 0 && p.days === 0 &&
    p.hours === 0 && p.minutes === 0 && p.seconds === 0
}

// ============================================================================
// Predicates
// ============================================================================

/** True iff mode ≠ none and (mode ≠ custom or the custom period is non-empty) */
export function isRepeating(input: RecurrenceRuleInput | null | undefined): boolean {
  if (!input) return false
  switch (input.mode) {
    case 'none':
      return false
    case 'custom':
      return !isEmptyPeriod(toCustomPeriod(input.custom))
    default:
      return true
  }
}

export function normalizeSkipRule(input: Partial<SkipRule> | null | undefined): SkipRule | null {
  const remindEvery = nonNegativeInt(input?.remindEvery)
  const skipCount = nonNegativeInt(input?.skipCount)
  if (remindEvery > 0 && skipCount > 0) return { remindEvery, skipCount }
  return null
}

// ============================================================================
// Construction
// ============================================================================

export function createRecurrenceRule(input: RecurrenceRuleInput | null | undefined): RecurrenceRule | null {
  if (!input || !isRepeating(input)) return null

  let period: RecurrencePeriod
  if (input.mode === 'custom') {
    const custom = toCustomPeriod(input.custom)
    // Carry into canonical units; days stay independent of months
    const n = normalizeYmdhms(custom)
    period = { kind: 'custom', period: n }
  } else if (input.mode === 'none') {
    return null
  } else {
    period = { kind: 'preset', preset: input.mode }
  }

  const offset = input.offsetAfterSeconds
  return {
    period,
    endAt: input.endAt ?? null,
    skip: normalizeSkipRule(input.skip),
    pauseUntilAck: input.pauseUntilAck ?? false,
    offsetAfterSeconds: offset !== undefined && Number.isFinite(offset) ? Math.trunc(offset) : 0,
  }
}

/** Flat persisted/UI shape of a rule; `null` maps to mode `none` */
export function toRecurrenceRuleInput(rule: RecurrenceRule | null): RecurrenceRuleInput {
  if (!rule) return { mode: 'none' }
  return {
    mode: rule.period.kind === 'preset' ? rule.period.preset : 'custom',
    custom: rule.period.kind === 'custom' ? { ...rule.period.period } : null,
    endAt: rule.endAt,
    skip: rule.skip ? { ...rule.skip } : null,
    pauseUntilAck: rule.pauseUntilAck,
    offsetAfterSeconds: rule.offsetAfterSeconds,
  }
}

function samePeriod(a: RecurrencePeriod, b: RecurrencePeriod): boolean {
  if (a.kind === 'preset' || b.kind === 'preset') {
    return a.kind === 'preset' && b.kind === 'preset' && a.preset === b.preset
  }
  const p = a.period
  const q = b.period
  return p.years === q.years && p.months === q.months && p.days === q.days &&
    p.hours === q.hours && p.minutes === q.minutes && p.seconds === q.seconds
}

/** Structural equality of two normalized rules */
export function sameRecurrenceRule(a: RecurrenceRule | null, b: RecurrenceRule | null): boolean {
  if (a === null || b === null) return a === b
  return samePeriod(a.period, b.period) &&
    a.endAt === b.endAt &&
    a.skip?.remindEvery === b.skip?.remindEvery &&
    a.skip?.skipCount === b.skip?.skipCount &&
    a.pauseUntilAck === b.pauseUntilAck &&
    a.offsetAfterSeconds === b.offsetAfterSeconds
}

// ============================================================================
// Period Arithmetic
// ============================================================================

/** Raw next instant: `from` plus one period, without offset or end handling */
export function addPeriod(from: LocalDateTime, period: RecurrencePeriod): LocalDateTime {
  if (period.kind === 'preset') {
    switch (period.preset) {
      case 'daily':
        return addDaysToDateTime(from, 1)
      case 'weekly':
        return addDaysToDateTime(from, 7)
      case 'monthly':
        return addMonths(from, 1)
      case 'yearly':
        return addYears(from, 1)
    }
  }

  const p = period.period
  let next = from
  if (p.years > 0) next = addYears(next, p.years)
  if (p.months > 0) next = addMonths(next, p.months)
  const seconds = ((p.days * 24 + p.hours) * 60 + p.minutes) * 60 + p.seconds
  return seconds > 0 ? addSeconds(next, seconds) : next
}
