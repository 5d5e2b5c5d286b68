/**
 * Time & Date Utilities
 *
 * Local wall-clock instants as branded ISO strings. There is no time zone:
 * an instant is whatever the host clock showed. Arithmetic goes through a
 * day count since 1970-01-01 (proleptic Gregorian), so month lengths and leap
 * years only matter when converting back. Month/year addition clamps the day
 * to the target month's length.
 *
 * Because every component is zero-padded and the year has exactly four
 * digits, lexical order of two `LocalDateTime` values is chronological order.
 * Arithmetic saturates at `MIN_DATETIME` and `MAX_DATETIME` to keep it so.
 */

import { type Result, Ok, Err } from './result'
import { ParseError } from './errors'

export { ParseError } from './errors'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** `YYYY-MM-DD` */
export type LocalDate = string & { readonly [__localDate]: true }

/** `hh:mm:ss` */
export type LocalTime = string & { readonly [__localTime]: true }

/** `YYYY-MM-DDThh:mm:ss` */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

type CivilDate = { year: number; month: number; day: number }

// ============================================================================
// Calendar
// ============================================================================

const SECONDS_PER_DAY = 86_400
const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function isLeapYear(year: number): boolean {
  if (year % 400 === 0) return true
  if (year % 100 === 0) return false
  return year % 4 === 0
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28
  return MONTH_LENGTHS[month - 1] ?? 30
}

// Days since 1970-01-01; years are shifted to start in March so the leap
// day falls at the end of the cycle
function toEpochDay({ year, month, day }: CivilDate): number {
  const y = month <= 2 ? year - 1 : year
  const era = Math.floor(y / 400)
  const yearOfEra = y - era * 400
  const dayOfYear = Math.floor((153 * ((month + 9) % 12) + 2) / 5) + day - 1
  const dayOfEra = yearOfEra * 365 + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100) + dayOfYear
  return era * 146_097 + dayOfEra - 719_468
}

function fromEpochDay(epochDay: number): CivilDate {
  const z = epochDay + 719_468
  const era = Math.floor(z / 146_097)
  const dayOfEra = z - era * 146_097
  const yearOfEra = Math.floor(
    (dayOfEra - Math.floor(dayOfEra / 1460) + Math.floor(dayOfEra / 36_524) - Math.floor(dayOfEra / 146_096)) / 365
  )
  const dayOfYear = dayOfEra - (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100))
  const shiftedMonth = Math.floor((5 * dayOfYear + 2) / 153)
  const day = dayOfYear - Math.floor((153 * shiftedMonth + 2) / 5) + 1
  const month = shiftedMonth < 10 ? shiftedMonth + 3 : shiftedMonth - 9
  return { year: yearOfEra + era * 400 + (month <= 2 ? 1 : 0), month, day }
}

// ============================================================================
// Construction
// ============================================================================

function pad(n: number, width: number): string {
  return String(n).padStart(width, '0')
}

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second = 0): LocalTime {
  return `${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

/** Reads the wall-clock components of a JS Date in the host's time zone */
export function fromJsDate(d: Date): LocalDateTime {
  return makeDateTime(
    makeDate(d.getFullYear(), d.getMonth() + 1, d.getDate()),
    makeTime(d.getHours(), d.getMinutes(), d.getSeconds())
  )
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/

function group(match: RegExpExecArray, index: number): number {
  return Number(match[index] ?? 0)
}

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = DATE_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = group(match, 1)
  const month = group(match, 2)
  const day = group(match, 3)
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return Err(new ParseError(`Date out of range: '${str}'`))
  }
  return Ok(makeDate(year, month, day))
}

/** `hh:mm` or `hh:mm:ss` */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = TIME_PATTERN.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = group(match, 1)
  const minute = group(match, 2)
  const second = group(match, 3)
  if (hour > 23 || minute > 59 || second > 59) {
    return Err(new ParseError(`Time out of range: '${str}'`))
  }
  return Ok(makeTime(hour, minute, second))
}

/** Accepts `YYYY-MM-DDThh:mm` or `YYYY-MM-DDThh:mm:ss`; normalizes to seconds precision */
export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const [datePart, timePart, ...rest] = str.split('T')
  if (datePart === undefined || timePart === undefined || rest.length > 0) {
    return Err(new ParseError(`Invalid datetime format: '${str}'`))
  }

  const date = parseDate(datePart)
  if (!date.ok) return date
  const time = parseTime(timePart)
  if (!time.ok) return time
  return Ok(makeDateTime(date.value, time.value))
}

// ============================================================================
// Components
// ============================================================================

function field(s: string, start: number, end: number): number {
  return Number(s.slice(start, end))
}

export const yearOf = (date: LocalDate): number => field(date, 0, 4)
export const monthOf = (date: LocalDate): number => field(date, 5, 7)
export const dayOf = (date: LocalDate): number => field(date, 8, 10)
export const hourOf = (time: LocalTime): number => field(time, 0, 2)
export const minuteOf = (time: LocalTime): number => field(time, 3, 5)
export const secondOf = (time: LocalTime): number => field(time, 6, 8)

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.slice(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.slice(11) as LocalTime
}

function civil(date: LocalDate): CivilDate {
  return { year: yearOf(date), month: monthOf(date), day: dayOf(date) }
}

function toEpochSeconds(dt: LocalDateTime): number {
  const time = timeOf(dt)
  return toEpochDay(civil(dateOf(dt))) * SECONDS_PER_DAY +
    hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time)
}

function fromEpochSeconds(total: number): LocalDateTime {
  if (total >= MAX_EPOCH_SECONDS) return MAX_DATETIME
  if (total <= MIN_EPOCH_SECONDS) return MIN_DATETIME
  const epochDay = Math.floor(total / SECONDS_PER_DAY)
  const secondOfDay = total - epochDay * SECONDS_PER_DAY
  const { year, month, day } = fromEpochDay(epochDay)
  return makeDateTime(
    makeDate(year, month, day),
    makeTime(Math.floor(secondOfDay / 3600), Math.floor((secondOfDay % 3600) / 60), secondOfDay % 60)
  )
}

/** Latest representable instant; a far-future finish saturates here */
export const MAX_DATETIME = makeDateTime(makeDate(9999, 12, 31), makeTime(23, 59, 59))
export const MIN_DATETIME = makeDateTime(makeDate(0, 1, 1), makeTime(0, 0, 0))

const MAX_EPOCH_SECONDS = toEpochSeconds(MAX_DATETIME)
const MIN_EPOCH_SECONDS = toEpochSeconds(MIN_DATETIME)
const MAX_EPOCH_DAY = Math.floor(MAX_EPOCH_SECONDS / SECONDS_PER_DAY)
const MIN_EPOCH_DAY = Math.floor(MIN_EPOCH_SECONDS / SECONDS_PER_DAY)

// ============================================================================
// Formatting
// ============================================================================

/** Display form used in notification bodies: `YYYY-MM-DD hh:mm` */
export function formatDisplay(dt: LocalDateTime): string {
  return `${dateOf(dt)} ${timeOf(dt).slice(0, 5)}`
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const epochDay = toEpochDay(civil(date)) + Math.trunc(n)
  if (epochDay >= MAX_EPOCH_DAY) return dateOf(MAX_DATETIME)
  if (epochDay <= MIN_EPOCH_DAY) return dateOf(MIN_DATETIME)
  const { year, month, day } = fromEpochDay(epochDay)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toEpochDay(civil(b)) - toEpochDay(civil(a))
}

export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  return fromEpochSeconds(toEpochSeconds(dt) + Math.trunc(n))
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, n * 60)
}

export function addDaysToDateTime(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, Math.trunc(n) * SECONDS_PER_DAY)
}

/** Calendar month addition; the day is clamped to the target month's length */
export function addMonths(dt: LocalDateTime, n: number): LocalDateTime {
  const { year, month, day } = civil(dateOf(dt))
  const monthIndex = year * 12 + (month - 1) + Math.trunc(n)
  const targetYear = Math.floor(monthIndex / 12)
  if (targetYear > 9999) return MAX_DATETIME
  if (targetYear < 0) return MIN_DATETIME
  const targetMonth = monthIndex - targetYear * 12 + 1
  const targetDay = Math.min(day, daysInMonth(targetYear, targetMonth))
  return makeDateTime(makeDate(targetYear, targetMonth, targetDay), timeOf(dt))
}

export function addYears(dt: LocalDateTime, n: number): LocalDateTime {
  return addMonths(dt, Math.trunc(n) * 12)
}

/** Signed number of seconds from `a` to `b` */
export function secondsBetween(a: LocalDateTime, b: LocalDateTime): number {
  return toEpochSeconds(b) - toEpochSeconds(a)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/** The earlier of two instants; `null` stands for "none yet" */
export function earliest(a: LocalDateTime | null, b: LocalDateTime): LocalDateTime {
  return a === null || b < a ? b : a
}
