/**
 * upgrade-timers
 *
 * Public API exports
 */

// Error system
export {
  UpgradeTimersError, UpgradeTimersErrorCode,
  DuplicateKeyError, InvalidDataError, ValidationError, NotFoundError, ParseError,
} from './errors'
export type { UpgradeTimersErrorCode as UpgradeTimersErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'
export {
  isLeapYear, daysInMonth,
  parseDate, parseTime, parseDateTime,
  makeDate, makeTime, makeDateTime, fromJsDate,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  formatDisplay,
  addDays, daysBetween, addSeconds, addMinutes, addDaysToDateTime, addMonths, addYears,
  MIN_DATETIME, MAX_DATETIME,
  secondsBetween, compareDateTimes, earliest,
} from './time-date'

// Durations
export type { DhmsParts, YmdhmsParts, DurationLabels, FormatDurationOptions } from './duration'
export {
  normalizeDhms, normalizeYmdhms, isCanonicalDhms, totalSeconds,
  formatDuration, formatRemaining,
} from './duration'

// Recurrence
export type {
  RecurrenceMode, PresetKind, CustomPeriod, RecurrencePeriod,
  SkipRule, RecurrenceRule, RecurrenceRuleInput,
} from './recurrence-rule'
export {
  RECURRENCE_MODES, isRecurrenceMode, isRepeating,
  createRecurrenceRule, toRecurrenceRuleInput, sameRecurrenceRule, addPeriod,
} from './recurrence-rule'
export type { SkipCursor } from './skip-cursor'
export { initialCursor, isNotifyOccurrence, countNotifyOccurrences, isValidCursor, normalizeCursor } from './skip-cursor'
export type { RecurrenceState, OccurrenceState, AdvanceOutcome, AckMode } from './recurrence-engine'
export {
  nextOccurrence, followingOccurrence, reachesEnd, recurrenceState,
  advanceOccurrence, acknowledgeOccurrence,
} from './recurrence-engine'

// Tasks
export type { Task, TaskInput, TaskDuration } from './task'
export { DEFAULT_ACCOUNT, DEFAULT_TASK_NAME, createTask, editTask, computeFinish } from './task'

// Deletion & ordering
export type { DeletionPolicy, DeletionPolicyOptions, PurgeCandidate } from './deletion-policy'
export { createDeletionPolicy, shouldPurge, retentionFromSetting } from './deletion-policy'
export { sortByFinish, insertByFinish } from './finish-order'

// Settings
export type { Settings } from './settings'
export { defaultSettings, normalizeSettings, deletionPolicyFor } from './settings'

// Scheduler
export type {
  SchedulerOptions, NotificationKind, SentNotification,
  OccurrenceChange, TickResult, NotificationScheduler,
} from './notification-scheduler'
export {
  DEFAULT_SCHEDULER_OPTIONS, computeNextDelay, nextWakeInstant, isActive,
  notificationTitle, notificationBody,
} from './notification-scheduler'

// Collaborators & logging
export type { Notifier, Clock } from './collaborators'
export { systemClock, createLogNotifier } from './collaborators'
export type { Logger, LogLevel, LogEntry, LogTransport, LoggerOptions } from './logging'
export { LOG_LEVELS, createLogger, consoleTransport, createMemoryTransport } from './logging'

// Adapter (persistence interface + in-memory mock)
export type { Adapter, MockAdapter } from './adapter'
export { createMockAdapter, transferState } from './adapter'

// SQLite adapter
export type { SqliteAdapter } from './sqlite-adapter'
export { createSqliteAdapter } from './sqlite-adapter'

// High-level API (wraps all modules into a stateful tracker object)
export type {
  UpgradeTimers, UpgradeTimersConfig, UpgradeTimersEvents, UpgradeTimersEvent, SortMode,
} from './public-api'
export { createUpgradeTimers } from './public-api'
