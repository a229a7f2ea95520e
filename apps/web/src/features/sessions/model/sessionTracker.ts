import type { CategoryId } from '@/features/simulation/engine/api/types'
import { NONE_CATEGORY_ID } from '@/features/categories/model/categoryRegistry'

const MS_PER_SECOND = 1000

export interface Session {
  id: number
  category: CategoryId
  startedAtMs: number
  endedAtMs: number
  elapsedSeconds: number
}

/** Seconds credited to a category since the previous poll. */
export interface ElapsedIncrement {
  category: CategoryId
  seconds: number
}

interface RunningSession {
  id: number
  category: CategoryId
  startedAtMs: number
  creditedSeconds: number
}

/**
 * Tracks one running session at a time against host timestamps
 * (performance.now() or Date.now(); only differences matter). Time is
 * handed out in whole seconds so the spawner never sees fractions.
 */
export class SessionTracker {
  private running: RunningSession | null = null
  private readonly closed: Session[] = []
  private nextSessionId = 1
  private active: CategoryId = NONE_CATEGORY_ID

  get activeCategory(): CategoryId {
    return this.active
  }

  get isRunning(): boolean {
    return this.running !== null
  }

  get sessions(): readonly Session[] {
    return this.closed
  }

  /** Whole seconds since the running session started, or 0. */
  elapsedSeconds(nowMs: number): number {
    if (!this.running) return 0
    return wholeSeconds(nowMs - this.running.startedAtMs)
  }

  /** Returns false when a session is already running. */
  start(category: CategoryId, nowMs: number): boolean {
    if (this.running) return false
    this.active = category
    this.running = { id: this.nextSessionId++, category, startedAtMs: nowMs, creditedSeconds: 0 }
    return true
  }

  /**
   * Seconds the running session earned since the last poll. A clock that
   * went backwards yields nothing until it catches up.
   */
  poll(nowMs: number): ElapsedIncrement | null {
    const run = this.running
    if (!run) return null

    const elapsed = wholeSeconds(nowMs - run.startedAtMs)
    const seconds = elapsed - run.creditedSeconds
    if (seconds <= 0) return null

    run.creditedSeconds = elapsed
    return { category: run.category, seconds }
  }

  /**
   * Ends the running session. Time not yet polled is not credited here:
   * callers poll first so the last increment reaches the spawner.
   */
  stop(nowMs: number): Session | null {
    const run = this.running
    if (!run) return null

    const endedAtMs = Math.max(nowMs, run.startedAtMs)
    const session: Session = {
      id: run.id,
      category: run.category,
      startedAtMs: run.startedAtMs,
      endedAtMs,
      elapsedSeconds: wholeSeconds(endedAtMs - run.startedAtMs),
    }
    this.closed.push(session)
    this.running = null
    return session
  }

  /**
   * Makes `category` active. A running session is flushed, closed and
   * restarted under the new category; the flushed increment is returned.
   */
  switchCategory(category: CategoryId, nowMs: number): ElapsedIncrement | null {
    if (!this.running) {
      this.active = category
      return null
    }
    if (this.running.category === category) return null

    const flushed = this.poll(nowMs)
    this.stop(nowMs)
    this.start(category, nowMs)
    return flushed
  }

  /** Falls back to "none" when the active category goes away. */
  categoryRemoved(category: CategoryId, nowMs: number): ElapsedIncrement | null {
    if (this.active !== category) return null
    return this.switchCategory(NONE_CATEGORY_ID, nowMs)
  }

  /** Closed-session seconds per category, in first-seen order. */
  totalsByCategory(): Array<[CategoryId, number]> {
    return sumByCategory(this.closed)
  }

  restore(sessions: Iterable<Session>): void {
    for (const session of sessions) {
      this.closed.push({ ...session })
      this.nextSessionId = Math.max(this.nextSessionId, session.id + 1)
    }
  }
}

export function sumByCategory(sessions: Iterable<Session>): Array<[CategoryId, number]> {
  const totals = new Map<CategoryId, number>()
  for (const session of sessions) {
    totals.set(session.category, (totals.get(session.category) ?? 0) + session.elapsedSeconds)
  }
  return [...totals]
}

function wholeSeconds(ms: number): number {
  if (!Number.isFinite(ms) || ms <= 0) return 0
  return Math.floor(ms / MS_PER_SECOND)
}
