/**
 * Seedable PRNG (mulberry32) with explicit state
 *
 * The whole generator is one uint32, so a tick sequence can be replayed by
 * saving `state` before it and restoring it afterwards.
 */

export class Random {
  private _state: number

  constructor(seed: number = 0) {
    this._state = seed >>> 0
  }

  get state(): number { return this._state }
  set state(value: number) { this._state = value >>> 0 }

  nextUint32(): number {
    this._state = (this._state + 0x6D2B79F5) >>> 0
    let x = this._state
    x = Math.imul(x ^ (x >>> 15), x | 1)
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61)
    return (x ^ (x >>> 14)) >>> 0
  }

  next01(): number {
    return this.nextUint32() / 0x1_0000_0000
  }

  nextBool(): boolean {
    return (this.nextUint32() & 1) === 1
  }

  /** Integer in [0, max) */
  nextInt(max: number): number {
    if (max <= 1) return 0
    return Math.floor(this.next01() * max)
  }

  clone(): Random {
    const copy = new Random()
    copy._state = this._state
    return copy
  }
}
