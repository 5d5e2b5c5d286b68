/**
 * Deletion Policy
 *
 * Decides whether a task record may be purged from the list. Two independent
 * windows apply: the undo window after a manual delete, and the retention of
 * completed tasks. Stateless: the same (task, now, force) always gives the
 * same answer.
 */

import type { LocalDateTime } from './time-date'
import { secondsBetween } from './time-date'
import type { Task } from './task'

// ============================================================================
// Types
// ============================================================================

export type DeletionPolicyOptions = {
  /** Undo window after a manual delete, in seconds */
  pendingDeleteGraceSeconds?: number
  /** How long a completed task stays visible, in seconds; `Infinity` keeps it */
  completedRetentionSeconds?: number
}

export type DeletionPolicy = {
  readonly pendingDeleteGraceSeconds: number
  readonly completedRetentionSeconds: number
  shouldPurge(task: PurgeCandidate, now: LocalDateTime, force: boolean): boolean
}

export type PurgeCandidate = Pick<Task, 'pendingDelete' | 'deleteMarkedAt' | 'done' | 'completedAt'>

export const DEFAULT_PENDING_DELETE_GRACE_SECONDS = 3
export const DEFAULT_COMPLETED_RETENTION_SECONDS = 60

// ============================================================================
// Public API
// ============================================================================

export function shouldPurge(
  task: PurgeCandidate,
  now: LocalDateTime,
  force: boolean,
  options: Required<DeletionPolicyOptions>
): boolean {
  if (task.pendingDelete) {
    if (force) return true
    // No mark instant: treat as marked long ago
    if (task.deleteMarkedAt === null) return true
    return secondsBetween(task.deleteMarkedAt, now) >= options.pendingDeleteGraceSeconds
  }

  if (task.done && task.completedAt !== null) {
    return secondsBetween(task.completedAt, now) >= options.completedRetentionSeconds
  }

  return false
}

export function createDeletionPolicy(options: DeletionPolicyOptions = {}): DeletionPolicy {
  const resolved: Required<DeletionPolicyOptions> = {
    pendingDeleteGraceSeconds: options.pendingDeleteGraceSeconds ?? DEFAULT_PENDING_DELETE_GRACE_SECONDS,
    completedRetentionSeconds: options.completedRetentionSeconds ?? DEFAULT_COMPLETED_RETENTION_SECONDS,
  }

  return {
    ...resolved,
    shouldPurge(task, now, force) {
      return shouldPurge(task, now, force, resolved)
    },
  }
}

/** Retention derived from the auto-delete setting: zero or less means keep forever */
export function retentionFromSetting(autoDeleteCompletedSeconds: number): number {
  return autoDeleteCompletedSeconds > 0 ? autoDeleteCompletedSeconds : Infinity
}
