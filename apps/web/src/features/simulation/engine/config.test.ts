import { describe, expect, it } from 'vitest'
import { DEFAULT_SAND_CONFIG, resolveSandConfig } from './config'

describe('resolveSandConfig', () => {
  it('returns the defaults with nothing set', () => {
    expect(resolveSandConfig({}, {})).toEqual(DEFAULT_SAND_CONFIG)
  })

  it('reads env strings', () => {
    const config = resolveSandConfig(
      {},
      {
        VITE_SECONDS_PER_GRAIN: '30',
        VITE_MAX_GRAINS_PER_TICK: '4',
        VITE_SPAWN_POLICY: 'per-category',
        VITE_SAND_SEED: '7',
        VITE_TICK_INTERVAL_MS: '16',
      }
    )

    expect(config).toEqual({
      secondsPerGrain: 30,
      maxGrainsPerTick: 4,
      spawnPolicy: 'per-category',
      seed: 7,
      tickIntervalMs: 16,
      renderMode: 'braille',
    })
  })

  it('lets overrides win over env', () => {
    const config = resolveSandConfig({ secondsPerGrain: 5, renderMode: 'cells' }, { VITE_SECONDS_PER_GRAIN: '30' })

    expect(config.secondsPerGrain).toBe(5)
    expect(config.renderMode).toBe('cells')
  })

  it('clamps and floors out-of-range values', () => {
    const config = resolveSandConfig({ maxGrainsPerTick: 0, tickIntervalMs: 5000, seed: -1 }, { VITE_SECONDS_PER_GRAIN: '0' })

    expect(config.maxGrainsPerTick).toBe(1)
    expect(config.tickIntervalMs).toBe(1000)
    expect(config.seed).toBe(0xFFFFFFFF)
    expect(config.secondsPerGrain).toBe(0.001)
  })

  it('skips values that do not parse', () => {
    const config = resolveSandConfig(
      { secondsPerGrain: Number.NaN },
      { VITE_SECONDS_PER_GRAIN: 'soon', VITE_SPAWN_POLICY: 'random', VITE_MAX_GRAINS_PER_TICK: '' }
    )

    expect(config.secondsPerGrain).toBe(DEFAULT_SAND_CONFIG.secondsPerGrain)
    expect(config.spawnPolicy).toBe('round-robin')
    expect(config.maxGrainsPerTick).toBe(DEFAULT_SAND_CONFIG.maxGrainsPerTick)
  })
})
