/**
 * Finish-Order Index
 *
 * Default list ordering: earliest finish first, ties kept in insertion order.
 */

import type { Task } from './task'

type HasFinish = Pick<Task, 'finish'>

/** Stable ascending sort by finish; returns a new array */
export function sortByFinish<T extends HasFinish>(tasks: readonly T[]): T[] {
  return [...tasks].sort((a, b) => (a.finish < b.finish ? -1 : a.finish > b.finish ? 1 : 0))
}

/**
 * Inserts `item` before the first element whose finish is strictly later,
 * so equal finishes keep their arrival order. Returns the insertion index.
 */
export function insertByFinish<T extends HasFinish>(tasks: T[], item: T): number {
  let i = 0
  while (i < tasks.length && (tasks[i]?.finish ?? item.finish) <= item.finish) i++
  tasks.splice(i, 0, item)
  return i
}
