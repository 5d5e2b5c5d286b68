/**
 * Shared test fixtures: instant parsing, a hand-driven clock, a notifier that
 * records what it was asked to show, and a logger that keeps its entries.
 */
import { parseDateTime, addSeconds, type LocalDateTime } from '../../src/time-date'
import type { Clock, Notifier } from '../../src/collaborators'
import { createLogger, createMemoryTransport, type Logger, type LogEntry } from '../../src/logging'

export function datetime(iso: string): LocalDateTime {
  const result = parseDateTime(iso)
  if (!result.ok) throw result.error
  return result.value
}

export type ManualClock = Clock & {
  set(instant: string): void
  advance(seconds: number): LocalDateTime
}

export function createManualClock(start: string): ManualClock {
  let current = datetime(start)
  return {
    now: () => current,
    set(instant) {
      current = datetime(instant)
    },
    advance(seconds) {
      current = addSeconds(current, seconds)
      return current
    },
  }
}

export type RecordingNotifier = Notifier & {
  sent: Array<{ title: string; body: string }>
}

export function createRecordingNotifier(): RecordingNotifier {
  const sent: Array<{ title: string; body: string }> = []
  return {
    sent,
    notify(title, body) {
      sent.push({ title, body })
    },
  }
}

export function createTestLogger(): { logger: Logger; entries: LogEntry[] } {
  const transport = createMemoryTransport()
  return { logger: createLogger('test', { level: 'trace', transport }), entries: transport.entries }
}
