/**
 * Duration Module
 *
 * Carry-resolution of duration tuples and human-readable duration formatting.
 * Days never carry into months: month length is ambiguous, so years, months
 * and days stay independent buckets.
 */

import type { LocalDateTime } from './time-date'
import { secondsBetween } from './time-date'

// ============================================================================
// Types
// ============================================================================

export type DhmsParts = {
  days: number
  hours: number
  minutes: number
  seconds: number
}

export type YmdhmsParts = DhmsParts & {
  years: number
  months: number
}

export type DurationLabels = {
  day: string
  hour: string
  minute: string
  second: string
}

export type FormatDurationOptions = {
  showSeconds?: boolean
  labels?: Partial<DurationLabels>
}

const DEFAULT_LABELS: DurationLabels = { day: 'd', hour: 'h', minute: 'm', second: 's' }

// ============================================================================
// Helpers
// ============================================================================

function clampInt(n: number): number {
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Carry seconds → minutes → hours → days so that
 * 0 ≤ seconds < 60, 0 ≤ minutes < 60 and 0 ≤ hours < 24.
 * Negative (or non-finite) inputs are clamped to zero first.
 */
export function normalizeDhms(parts: DhmsParts): DhmsParts {
  let seconds = clampInt(parts.seconds)
  let minutes = clampInt(parts.minutes)
  let hours = clampInt(parts.hours)
  let days = clampInt(parts.days)

  minutes += Math.floor(seconds / 60)
  seconds %= 60
  hours += Math.floor(minutes / 60)
  minutes %= 60
  days += Math.floor(hours / 24)
  hours %= 24

  return { days, hours, minutes, seconds }
}

/** {@link normalizeDhms} plus months ≥ 12 carried into years */
export function normalizeYmdhms(parts: YmdhmsParts): YmdhmsParts {
  let years = clampInt(parts.years)
  let months = clampInt(parts.months)
  const dhms = normalizeDhms(parts)

  years += Math.floor(months / 12)
  months %= 12

  return { years, months, ...dhms }
}

export function isCanonicalDhms(parts: DhmsParts): boolean {
  const n = normalizeDhms(parts)
  return n.days === parts.days && n.hours === parts.hours &&
    n.minutes === parts.minutes && n.seconds === parts.seconds
}

export function totalSeconds(parts: DhmsParts): number {
  const n = normalizeDhms(parts)
  return ((n.days * 24 + n.hours) * 60 + n.minutes) * 60 + n.seconds
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Compact duration text, e.g. `1d 2h 5m`. Zero-valued units are omitted;
 * an all-zero duration renders as `0m` (or `0s` with seconds shown).
 */
export function formatDuration(parts: DhmsParts, options: FormatDurationOptions = {}): string {
  const labels = { ...DEFAULT_LABELS, ...options.labels }
  const showSeconds = options.showSeconds ?? false
  const n = normalizeDhms(parts)

  if (n.days === 0 && n.hours === 0 && n.minutes === 0 && (!showSeconds || n.seconds === 0)) {
    return showSeconds ? `0${labels.second}` : `0${labels.minute}`
  }

  const out: string[] = []
  if (n.days > 0) out.push(`${n.days}${labels.day}`)
  if (n.hours > 0) out.push(`${n.hours}${labels.hour}`)
  if (n.minutes > 0) out.push(`${n.minutes}${labels.minute}`)
  if (showSeconds && n.seconds > 0) out.push(`${n.seconds}${labels.second}`)
  return out.join(' ')
}

/**
 * Time left until `finish`. Returns `dueLabel` once the instant has passed;
 * multi-day remainders drop the seconds.
 */
export function formatRemaining(
  finish: LocalDateTime,
  now: LocalDateTime,
  options: { dueLabel?: string; labels?: Partial<DurationLabels> } = {}
): string {
  const left = secondsBetween(now, finish)
  if (left <= 0) return options.dueLabel ?? 'due'

  const parts = normalizeDhms({ days: 0, hours: 0, minutes: 0, seconds: left })
  return formatDuration(parts, {
    showSeconds: parts.days === 0,
    ...(options.labels ? { labels: options.labels } : {}),
  })
}
