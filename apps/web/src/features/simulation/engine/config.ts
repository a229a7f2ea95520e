import type { RenderMode, SpawnPolicy } from './api/types'
import { DEFAULT_TICK_INTERVAL_MS } from './timing'

export interface SandConfig {
  /** Tracked seconds that make one grain */
  secondsPerGrain: number
  /** Upper bound on grains drained into the grid per tick */
  maxGrainsPerTick: number
  spawnPolicy: SpawnPolicy
  /** Initial PRNG state */
  seed: number
  tickIntervalMs: number
  renderMode: RenderMode
}

export const DEFAULT_SAND_CONFIG: Readonly<SandConfig> = {
  secondsPerGrain: 60,
  maxGrainsPerTick: 8,
  spawnPolicy: 'round-robin',
  seed: 0x5eed,
  tickIntervalMs: DEFAULT_TICK_INTERVAL_MS,
  renderMode: 'braille',
}

export type SandEnv = {
  VITE_SECONDS_PER_GRAIN?: string
  VITE_MAX_GRAINS_PER_TICK?: string
  VITE_SPAWN_POLICY?: string
  VITE_SAND_SEED?: string
  VITE_TICK_INTERVAL_MS?: string
}

const MAX_SECONDS_PER_GRAIN = 86_400
const MAX_GRAINS_PER_TICK = 4096
const MAX_TICK_INTERVAL_MS = 1000

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  if (typeof value === 'string' && value.trim() !== '') {
    const n = Number(value)
    if (Number.isFinite(n)) return n
  }
  return null
}

function clamp(n: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, n))
}

function toClampedNumber(value: unknown, min: number, max: number): number | null {
  const n = toFiniteNumber(value)
  if (n === null) return null
  return clamp(n, min, max)
}

function toClampedInt(value: unknown, min: number, max: number): number | null {
  const n = toFiniteNumber(value)
  if (n === null) return null
  return clamp(Math.floor(n), min, max)
}

function toSpawnPolicy(value: unknown): SpawnPolicy | null {
  return value === 'round-robin' || value === 'per-category' ? value : null
}

function toRenderMode(value: unknown): RenderMode | null {
  return value === 'cells' || value === 'braille' ? value : null
}

function toSeed(value: unknown): number | null {
  const n = toFiniteNumber(value)
  if (n === null) return null
  return Math.floor(n) >>> 0
}

export function readSandEnv(): SandEnv {
  const env = import.meta.env
  return {
    VITE_SECONDS_PER_GRAIN: env.VITE_SECONDS_PER_GRAIN,
    VITE_MAX_GRAINS_PER_TICK: env.VITE_MAX_GRAINS_PER_TICK,
    VITE_SPAWN_POLICY: env.VITE_SPAWN_POLICY,
    VITE_SAND_SEED: env.VITE_SAND_SEED,
    VITE_TICK_INTERVAL_MS: env.VITE_TICK_INTERVAL_MS,
  }
}

/**
 * Defaults, then env, then explicit overrides. Each value is parsed and
 * clamped on its own; one that does not parse leaves the previous layer.
 */
export function resolveSandConfig(overrides: Partial<SandConfig> = {}, env: SandEnv = readSandEnv()): SandConfig {
  const d = DEFAULT_SAND_CONFIG

  const secondsPerGrain =
    toClampedNumber(overrides.secondsPerGrain, 0.001, MAX_SECONDS_PER_GRAIN) ??
    toClampedNumber(env.VITE_SECONDS_PER_GRAIN, 0.001, MAX_SECONDS_PER_GRAIN) ??
    d.secondsPerGrain

  const maxGrainsPerTick =
    toClampedInt(overrides.maxGrainsPerTick, 1, MAX_GRAINS_PER_TICK) ??
    toClampedInt(env.VITE_MAX_GRAINS_PER_TICK, 1, MAX_GRAINS_PER_TICK) ??
    d.maxGrainsPerTick

  const spawnPolicy = toSpawnPolicy(overrides.spawnPolicy) ?? toSpawnPolicy(env.VITE_SPAWN_POLICY) ?? d.spawnPolicy

  const seed = toSeed(overrides.seed) ?? toSeed(env.VITE_SAND_SEED) ?? d.seed

  const tickIntervalMs =
    toClampedNumber(overrides.tickIntervalMs, 1, MAX_TICK_INTERVAL_MS) ??
    toClampedNumber(env.VITE_TICK_INTERVAL_MS, 1, MAX_TICK_INTERVAL_MS) ??
    d.tickIntervalMs

  const renderMode = toRenderMode(overrides.renderMode) ?? d.renderMode

  return { secondsPerGrain, maxGrainsPerTick, spawnPolicy, seed, tickIntervalMs, renderMode }
}
