// Tick cadence shared by the clock and the host loop.

// ~30 physics steps per second
export const DEFAULT_TICK_INTERVAL_MS = 32
export const MAX_DT_MS = 100
export const MAX_STEPS_PER_FRAME = 8

export const SPEED_OPTIONS = [0.5, 1, 2, 4] as const
export type SimulationSpeed = (typeof SPEED_OPTIONS)[number]
