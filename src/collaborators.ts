/**
 * Collaborators
 *
 * The host services the core depends on but does not implement: a notifier
 * that surfaces messages to the user and a clock that reads local wall time.
 */

import type { LocalDateTime } from './time-date'
import { fromJsDate } from './time-date'
import type { Logger } from './logging'

export type Notifier = {
  /** Fire-and-forget; a throwing notifier is logged by the caller */
  notify(title: string, body: string): void
}

export type Clock = {
  now(): LocalDateTime
}

export const systemClock: Clock = {
  now: () => fromJsDate(new Date()),
}

/** Notifier that writes each notification to the logger at info level */
export function createLogNotifier(logger: Logger): Notifier {
  return {
    notify(title, body) {
      logger.info(title, { body })
    },
  }
}
