import { create } from 'zustand'
import type { CategoryId } from '@/features/simulation/engine/api/types'
import { useSandStore } from '@/features/simulation/model/sandStore'
import { SessionTracker, sumByCategory, type ElapsedIncrement, type Session } from './sessionTracker'

interface SessionState {
  tracker: SessionTracker
  activeCategory: CategoryId
  isRunning: boolean
  startedAtMs: number | null
  sessions: readonly Session[]

  start: (nowMs?: number) => void
  stop: (nowMs?: number) => Session | null
  toggle: (nowMs?: number) => void
  switchCategory: (category: CategoryId, nowMs?: number) => void
  /** Feeds whole seconds earned since the last poll into the sand pile. */
  poll: (nowMs?: number) => ElapsedIncrement | null
  categoryRemoved: (category: CategoryId, nowMs?: number) => void
  /** Loads past sessions and rebuilds the pile from their totals. */
  restore: (sessions: Iterable<Session>) => void
}

function now(): number {
  return performance.now()
}

function credit(increment: ElapsedIncrement | null): void {
  if (increment) useSandStore.getState().recordElapsed(increment.category, increment.seconds)
}

export const useSessionStore = create<SessionState>((set, get) => {
  const tracker = new SessionTracker()

  function sync(startedAtMs: number | null = get().startedAtMs): void {
    set({
      activeCategory: tracker.activeCategory,
      isRunning: tracker.isRunning,
      startedAtMs: tracker.isRunning ? startedAtMs : null,
      sessions: [...tracker.sessions],
    })
  }

  return {
    tracker,
    activeCategory: tracker.activeCategory,
    isRunning: false,
    startedAtMs: null,
    sessions: [],

    start: (nowMs = now()) => {
      if (tracker.start(tracker.activeCategory, nowMs)) sync(nowMs)
    },

    stop: (nowMs = now()) => {
      credit(tracker.poll(nowMs))
      const session = tracker.stop(nowMs)
      sync()
      return session
    },

    toggle: (nowMs = now()) => {
      if (tracker.isRunning) get().stop(nowMs)
      else get().start(nowMs)
    },

    switchCategory: (category, nowMs = now()) => {
      const wasRunning = tracker.isRunning
      credit(tracker.switchCategory(category, nowMs))
      sync(wasRunning ? nowMs : null)
    },

    poll: (nowMs = now()) => {
      const increment = tracker.poll(nowMs)
      credit(increment)
      return increment
    },

    categoryRemoved: (category, nowMs = now()) => {
      // Seconds earned under a deleted category are not turned into grains
      const wasActive = tracker.activeCategory === category
      tracker.categoryRemoved(category, nowMs)
      if (wasActive) sync(tracker.isRunning ? nowMs : null)
    },

    restore: (sessions) => {
      const list = [...sessions]
      tracker.restore(list)
      useSandStore.getState().seedFromTotals(sumByCategory(list))
      sync()
    },
  }
})
