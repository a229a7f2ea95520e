import { DEFAULT_TICK_INTERVAL_MS, MAX_DT_MS, MAX_STEPS_PER_FRAME } from './timing'

/**
 * Fixed-step accumulator fed with host timestamps. Holds no timer: the host
 * calls `advance(now)` from its own frame callback and runs that many ticks.
 */
export class SimulationClock {
  private lastTime: number | null = null
  private stepAccumulator = 0
  private _speed = 1

  constructor(private readonly tickIntervalMs: number = DEFAULT_TICK_INTERVAL_MS) {}

  get speed(): number { return this._speed }

  setSpeed(speed: number): void {
    this._speed = Number.isFinite(speed) && speed > 0 ? speed : 1
  }

  /** Ticks owed since the previous call. The first call only primes. */
  advance(nowMs: number): number {
    if (!Number.isFinite(nowMs)) return 0

    const last = this.lastTime
    this.lastTime = nowMs
    if (last === null) return 0

    const dtMs = nowMs - last
    if (dtMs <= 0) return 0

    const clampedDt = Math.min(dtMs, MAX_DT_MS)
    this.stepAccumulator += (this._speed * clampedDt) / this.tickIntervalMs

    let steps = Math.floor(this.stepAccumulator)
    if (steps > MAX_STEPS_PER_FRAME) {
      steps = MAX_STEPS_PER_FRAME
      this.stepAccumulator = Math.min(Math.max(this.stepAccumulator - steps, 0), 1)
    } else {
      this.stepAccumulator -= steps
    }
    return steps
  }

  reset(): void {
    this.lastTime = null
    this.stepAccumulator = 0
  }
}
