/**
 * GrainSpawner - turns tracked time into queued grains
 *
 * Time is accounted per category: the grains a category has received from
 * tracked time always equal floor(trackedSeconds / secondsPerGrain), however
 * the seconds arrive (streamed increments, one bulk flush, or a seed).
 * Both sides of that division are kept in whole milliseconds so fractional
 * increments and quanta add up exactly.
 *
 * The pending queue is FIFO. `drain` hands out at most `max` grains; grains
 * the automaton could not place go back to the front through `requeue`.
 */

import type { CategoryId, Grain } from '../api/types'
import { debugLog } from '@/core/logging/log'

// Compact the backing array once this many drained slots pile up
const COMPACT_THRESHOLD = 1024

const MS_PER_SECOND = 1000

function toMillis(seconds: number): number {
  return Math.round(seconds * MS_PER_SECOND)
}

export class GrainSpawner {
  private queue: Grain[] = []
  private head = 0

  private readonly quantumMs: number
  private readonly trackedMs = new Map<CategoryId, number>()
  private readonly grainsFromTime = new Map<CategoryId, number>()
  private readonly enqueued = new Map<CategoryId, number>()
  private readonly pending = new Map<CategoryId, number>()

  constructor(readonly secondsPerGrain: number) {
    if (!Number.isFinite(secondsPerGrain) || toMillis(secondsPerGrain) < 1) {
      throw new RangeError(`secondsPerGrain must be at least 0.001, got ${String(secondsPerGrain)}`)
    }
    this.quantumMs = toMillis(secondsPerGrain)
  }

  get pendingCount(): number {
    return this.queue.length - this.head
  }

  pendingFor(category: CategoryId): number {
    return this.pending.get(category) ?? 0
  }

  totalEnqueued(category: CategoryId): number {
    return this.enqueued.get(category) ?? 0
  }

  trackedSecondsFor(category: CategoryId): number {
    return (this.trackedMs.get(category) ?? 0) / MS_PER_SECOND
  }

  timeGrainsFor(category: CategoryId): number {
    return this.grainsFromTime.get(category) ?? 0
  }

  /** Explicit "add grains" event, outside the time accounting. */
  enqueue(category: CategoryId, count: number): number {
    const n = Number.isFinite(count) ? Math.floor(count) : 0
    if (n <= 0) return 0

    for (let i = 0; i < n; i++) this.queue.push({ category })
    bump(this.enqueued, category, n)
    bump(this.pending, category, n)
    return n
  }

  /**
   * Adds tracked seconds for a category and enqueues whatever grains
   * the new total is owed. Returns the number of grains enqueued.
   */
  recordElapsed(category: CategoryId, seconds: number): number {
    const owed = this.accountElapsed(category, seconds)
    if (owed > 0) this.enqueue(category, owed)
    return owed
  }

  /**
   * Accounts historical totals like `recordElapsed`, but returns the owed
   * grains to the caller instead of queueing them, in input order.
   */
  seed(totals: Iterable<readonly [CategoryId, number]>): Grain[] {
    const grains: Grain[] = []
    for (const [category, seconds] of totals) {
      const owed = this.accountElapsed(category, seconds)
      if (owed <= 0) continue
      for (let i = 0; i < owed; i++) grains.push({ category })
      bump(this.enqueued, category, owed)
    }
    return grains
  }

  drain(max: number): Grain[] {
    const n = Number.isFinite(max) ? Math.max(0, Math.min(Math.floor(max), this.pendingCount)) : 0
    if (n === 0) return []

    const grains = this.queue.slice(this.head, this.head + n)
    this.head += n
    for (const grain of grains) bump(this.pending, grain.category, -1)
    this.compact()
    return grains
  }

  /** Puts grains back at the front of the queue, keeping their order. */
  requeue(grains: readonly Grain[]): void {
    if (grains.length === 0) return

    if (this.head >= grains.length) {
      this.head -= grains.length
      for (let i = 0; i < grains.length; i++) this.queue[this.head + i] = grains[i]
    } else {
      this.queue = [...grains, ...this.queue.slice(this.head)]
      this.head = 0
    }
    for (const grain of grains) bump(this.pending, grain.category, 1)
  }

  /** Drops queued grains of one category; returns how many were dropped. */
  discardPending(category: CategoryId): number {
    const kept: Grain[] = []
    let dropped = 0
    for (let i = this.head; i < this.queue.length; i++) {
      const grain = this.queue[i]
      if (grain.category === category) dropped++
      else kept.push(grain)
    }
    this.queue = kept
    this.head = 0
    this.pending.delete(category)
    return dropped
  }

  private accountElapsed(category: CategoryId, seconds: number): number {
    if (!Number.isFinite(seconds) || seconds <= 0) {
      if (seconds !== 0) debugLog('[GrainSpawner] ignoring elapsed seconds', { category, seconds })
      return 0
    }

    const totalMs = (this.trackedMs.get(category) ?? 0) + toMillis(seconds)
    this.trackedMs.set(category, totalMs)

    const owed = Math.floor(totalMs / this.quantumMs) - this.timeGrainsFor(category)
    if (owed > 0) bump(this.grainsFromTime, category, owed)
    return Math.max(0, owed)
  }

  private compact(): void {
    if (this.head < COMPACT_THRESHOLD || this.head * 2 < this.queue.length) return
    this.queue = this.queue.slice(this.head)
    this.head = 0
  }
}

function bump(map: Map<CategoryId, number>, key: CategoryId, delta: number): void {
  const next = (map.get(key) ?? 0) + delta
  if (next === 0) map.delete(key)
  else map.set(key, next)
}
