/**
 * Settings
 *
 * User-level settings persisted through the adapter, with defaults and
 * normalization of stored values.
 */

import type { DeletionPolicy } from './deletion-policy'
import { DEFAULT_PENDING_DELETE_GRACE_SECONDS, createDeletionPolicy, retentionFromSetting } from './deletion-policy'
import { DEFAULT_ACCOUNT } from './task'

export type Settings = {
  /** Lead time of the advance notification; 0 disables it */
  advanceNotifySeconds: number
  /** Also notify at the due instant when an advance notification was sent */
  alsoNotifyAtDue: boolean
  /** Retention of completed tasks; 0 keeps them until removed by hand */
  autoDeleteCompletedSeconds: number
  /** Undo window after a manual delete */
  pendingDeleteGraceSeconds: number
  accounts: string[]
  taskPresets: string[]
  /** Older stores only carried this flag for a fixed one-minute retention */
  autoDeleteCompletedAfter1Min?: boolean
}

export function defaultSettings(): Settings {
  return {
    advanceNotifySeconds: 0,
    alsoNotifyAtDue: true,
    autoDeleteCompletedSeconds: 0,
    pendingDeleteGraceSeconds: DEFAULT_PENDING_DELETE_GRACE_SECONDS,
    accounts: [DEFAULT_ACCOUNT],
    taskPresets: [],
  }
}

function seconds(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? Math.max(0, Math.floor(value)) : fallback
}

function strings(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback
  return value.filter((v): v is string => typeof v === 'string' && v.trim() !== '')
}

/**
 * Fills missing fields with defaults and repairs stored values: negative
 * seconds become 0, and the legacy one-minute flag maps to 60 seconds when no
 * explicit retention is set.
 */
export function normalizeSettings(raw: Partial<Settings> | null | undefined): Settings {
  const defaults = defaultSettings()
  if (!raw) return defaults

  let autoDelete = seconds(raw.autoDeleteCompletedSeconds, defaults.autoDeleteCompletedSeconds)
  if (autoDelete <= 0 && raw.autoDeleteCompletedAfter1Min === true) autoDelete = 60

  return {
    advanceNotifySeconds: seconds(raw.advanceNotifySeconds, defaults.advanceNotifySeconds),
    alsoNotifyAtDue: typeof raw.alsoNotifyAtDue === 'boolean' ? raw.alsoNotifyAtDue : defaults.alsoNotifyAtDue,
    autoDeleteCompletedSeconds: autoDelete,
    pendingDeleteGraceSeconds: seconds(raw.pendingDeleteGraceSeconds, defaults.pendingDeleteGraceSeconds),
    accounts: strings(raw.accounts, defaults.accounts),
    taskPresets: strings(raw.taskPresets, defaults.taskPresets),
  }
}

export function deletionPolicyFor(settings: Settings): DeletionPolicy {
  return createDeletionPolicy({
    pendingDeleteGraceSeconds: settings.pendingDeleteGraceSeconds,
    completedRetentionSeconds: retentionFromSetting(settings.autoDeleteCompletedSeconds),
  })
}
