import { describe, expect, it } from 'vitest'
import { SessionTracker } from './sessionTracker'
import { NONE_CATEGORY_ID } from '@/features/categories/model/categoryRegistry'
import { categoryId } from '@/features/simulation/engine/api/types'

const WORK = categoryId(1)
const PLAY = categoryId(2)

describe('SessionTracker', () => {
  it('hands out whole seconds since the last poll', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 1000)

    expect(tracker.poll(1500)).toBeNull()
    expect(tracker.poll(3200)).toEqual({ category: WORK, seconds: 2 })
    expect(tracker.poll(3900)).toBeNull()
    expect(tracker.poll(4000)).toEqual({ category: WORK, seconds: 1 })
    expect(tracker.elapsedSeconds(4000)).toBe(3)
  })

  it('refuses a second start while running', () => {
    const tracker = new SessionTracker()

    expect(tracker.start(WORK, 0)).toBe(true)
    expect(tracker.start(PLAY, 10)).toBe(false)
    expect(tracker.activeCategory).toBe(WORK)
  })

  it('closes a session on stop', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 0)

    expect(tracker.stop(2500)).toEqual({ id: 1, category: WORK, startedAtMs: 0, endedAtMs: 2500, elapsedSeconds: 2 })
    expect(tracker.isRunning).toBe(false)
    expect(tracker.stop(3000)).toBeNull()
    expect(tracker.poll(3000)).toBeNull()
  })

  it('waits for a clock that went backwards', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 1000)

    expect(tracker.poll(500)).toBeNull()
    expect(tracker.poll(2000)).toEqual({ category: WORK, seconds: 1 })
  })

  it('flushes and restarts when switching category mid-session', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 0)
    tracker.poll(1000)

    expect(tracker.switchCategory(PLAY, 2500)).toEqual({ category: WORK, seconds: 1 })
    expect(tracker.sessions).toHaveLength(1)
    expect(tracker.sessions[0].elapsedSeconds).toBe(2)
    expect(tracker.activeCategory).toBe(PLAY)
    expect(tracker.poll(3500)).toEqual({ category: PLAY, seconds: 1 })
  })

  it('only changes the active category when idle', () => {
    const tracker = new SessionTracker()

    expect(tracker.switchCategory(PLAY, 100)).toBeNull()
    expect(tracker.activeCategory).toBe(PLAY)
    expect(tracker.isRunning).toBe(false)
  })

  it('ignores a switch to the running category', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 0)

    expect(tracker.switchCategory(WORK, 5000)).toBeNull()
    expect(tracker.sessions).toHaveLength(0)
  })

  it('falls back to none when the active category is removed', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 0)

    expect(tracker.categoryRemoved(PLAY, 500)).toBeNull()
    expect(tracker.categoryRemoved(WORK, 1000)).toEqual({ category: WORK, seconds: 1 })
    expect(tracker.activeCategory).toBe(NONE_CATEGORY_ID)
    expect(tracker.isRunning).toBe(true)
  })

  it('sums closed sessions per category in first-seen order', () => {
    const tracker = new SessionTracker()
    tracker.start(WORK, 0)
    tracker.stop(2000)
    tracker.start(PLAY, 2000)
    tracker.stop(5000)
    tracker.start(WORK, 5000)
    tracker.stop(9000)

    expect(tracker.totalsByCategory()).toEqual([
      [WORK, 6],
      [PLAY, 3],
    ])
  })

  it('continues session ids after a restore', () => {
    const tracker = new SessionTracker()
    tracker.restore([{ id: 41, category: WORK, startedAtMs: 0, endedAtMs: 60_000, elapsedSeconds: 60 }])
    tracker.start(PLAY, 0)

    expect(tracker.stop(1000)?.id).toBe(42)
    expect(tracker.totalsByCategory()).toEqual([
      [WORK, 60],
      [PLAY, 1],
    ])
  })
})
