import { describe, expect, it } from 'vitest'
import { Random } from './Random'

function take(rng: Random, n: number): number[] {
  return Array.from({ length: n }, () => rng.nextUint32())
}

describe('Random', () => {
  it('repeats the same sequence for the same seed', () => {
    expect(take(new Random(42), 8)).toEqual(take(new Random(42), 8))
  })

  it('diverges for different seeds', () => {
    expect(take(new Random(1), 4)).not.toEqual(take(new Random(2), 4))
  })

  it('replays from a saved state', () => {
    const rng = new Random(7)
    take(rng, 3)
    const saved = rng.state
    const first = take(rng, 5)

    rng.state = saved
    expect(take(rng, 5)).toEqual(first)
  })

  it('clones without sharing state', () => {
    const rng = new Random(9)
    const copy = rng.clone()

    expect(copy.nextUint32()).toBe(rng.nextUint32())
    copy.nextUint32()
    expect(copy.state).not.toBe(rng.state)
  })

  it('keeps values in range', () => {
    const rng = new Random(123)
    for (let i = 0; i < 200; i++) {
      const u = rng.nextUint32()
      expect(Number.isInteger(u)).toBe(true)
      expect(u).toBeGreaterThanOrEqual(0)
      expect(u).toBeLessThan(2 ** 32)

      const f = rng.next01()
      expect(f).toBeGreaterThanOrEqual(0)
      expect(f).toBeLessThan(1)

      const n = rng.nextInt(5)
      expect(n).toBeGreaterThanOrEqual(0)
      expect(n).toBeLessThan(5)
    }
    expect(rng.nextInt(1)).toBe(0)
  })

  it('produces both booleans', () => {
    const rng = new Random(5)
    const seen = new Set(Array.from({ length: 64 }, () => rng.nextBool()))
    expect(seen).toEqual(new Set([true, false]))
  })
})
