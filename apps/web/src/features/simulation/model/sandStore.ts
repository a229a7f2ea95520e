import { create } from 'zustand'
import {
  SandEngine,
  SimulationClock,
  resolveSandConfig,
  serializeError,
  type CategoryId,
  type EngineResizeResult,
  type FrameBuffer,
  type LegendEntry,
  type RenderMode,
  type SandConfig,
  type SeedResult,
  type SimulationSpeed,
  type Size,
} from '@/features/simulation/engine'
import { useCategoryStore } from '@/features/categories/model/categoryStore'
import { debugLog, debugWarn, logError } from '@/core/logging/log'

// 80x24: a classic terminal, used until the view reports its size
export const DEFAULT_GRID_SIZE: Readonly<Size> = { width: 80, height: 24 }

interface SandState {
  // View state, refreshed by publish()
  frameBuffer: FrameBuffer | null
  legend: LegendEntry[]
  size: Size
  grainCount: number
  pendingCount: number
  tick: number

  isPlaying: boolean
  speed: SimulationSpeed
  renderMode: RenderMode

  // Runtime
  engine: SandEngine
  clock: SimulationClock

  frame: (nowMs: number) => number
  resize: (width: number, height: number) => EngineResizeResult
  seedFromTotals: (totals: Iterable<readonly [CategoryId, number]>) => SeedResult
  recordElapsed: (category: CategoryId, seconds: number) => number
  clear: () => void
  clearCategory: (category: CategoryId) => void
  play: () => void
  pause: () => void
  step: () => void
  setSpeed: (speed: SimulationSpeed) => void
  setRenderMode: (mode: RenderMode) => void
  toggleRenderMode: () => void
  /** Re-renders without ticking, e.g. after the categories changed. */
  refresh: () => void
  /**
   * Replaces the engine for tests and config changes. The pile, the queue and
   * the tracked-seconds accounting all start from zero; a caller that keeps
   * session totals must pass them to `seedFromTotals` afterwards.
   */
  reset: (options?: { size?: Size; config?: SandConfig }) => void
}

function createRuntime(size: Size, config: SandConfig): { engine: SandEngine; clock: SimulationClock } {
  return {
    engine: new SandEngine(size.width, size.height, config),
    clock: new SimulationClock(config.tickIntervalMs),
  }
}

export const useSandStore = create<SandState>((set, get) => {
  const initialConfig = resolveSandConfig()
  const reportedOrphans = new Set<CategoryId>()

  /** Renders the current grid against the current categories. */
  function publish(): void {
    const { engine, renderMode } = get()
    const table = useCategoryStore.getState().table
    const frameBuffer = engine.render(table, renderMode)

    for (const id of frameBuffer.orphaned) {
      if (reportedOrphans.has(id)) continue
      reportedOrphans.add(id)
      debugLog('[sand] grains reference an unknown category', id)
    }

    set({
      frameBuffer,
      legend: engine.legend(table),
      size: { width: engine.width, height: engine.height },
      grainCount: engine.grainCount,
      pendingCount: engine.pendingCount,
      tick: engine.frame,
    })
  }

  return {
    ...createRuntime(DEFAULT_GRID_SIZE, initialConfig),

    frameBuffer: null,
    legend: [],
    size: { ...DEFAULT_GRID_SIZE },
    grainCount: 0,
    pendingCount: 0,
    tick: 0,

    isPlaying: true,
    speed: 1,
    renderMode: initialConfig.renderMode,

    frame: (nowMs) => {
      const { engine, clock, isPlaying } = get()
      const steps = clock.advance(nowMs)
      if (!isPlaying || steps === 0) return 0

      try {
        engine.tickMany(steps)
      } catch (err) {
        logError('[sand] tick failed, pausing', serializeError(err))
        set({ isPlaying: false })
        return 0
      }
      publish()
      return steps
    },

    resize: (width, height) => {
      const result = get().engine.resize(width, height)
      if (!result.ok) {
        debugWarn('[sand] resize rejected', result.error.message)
        return result
      }
      publish()
      return result
    },

    seedFromTotals: (totals) => {
      const result = get().engine.seed(totals)
      publish()
      return result
    },

    recordElapsed: (category, seconds) => {
      const owed = get().engine.recordElapsed(category, seconds)
      if (owed > 0) set({ pendingCount: get().engine.pendingCount })
      return owed
    },

    clear: () => {
      get().engine.clear()
      reportedOrphans.clear()
      publish()
    },

    clearCategory: (category) => {
      const { removed, dropped } = get().engine.clearCategory(category)
      debugLog('[sand] cleared category', { category, removed, dropped })
      reportedOrphans.delete(category)
      publish()
    },

    play: () => {
      // Drop the paused interval so it does not turn into a burst of ticks
      get().clock.reset()
      set({ isPlaying: true })
    },
    pause: () => set({ isPlaying: false }),
    step: () => {
      get().engine.tick()
      publish()
    },

    setSpeed: (speed) => {
      get().clock.setSpeed(speed)
      set({ speed })
    },

    setRenderMode: (renderMode) => {
      set({ renderMode })
      publish()
    },
    toggleRenderMode: () => get().setRenderMode(get().renderMode === 'braille' ? 'cells' : 'braille'),
    refresh: () => publish(),

    reset: (options = {}) => {
      const { engine, speed } = get()
      const size = options.size ?? { width: engine.width, height: engine.height }
      const runtime = createRuntime(size, options.config ?? engine.config)
      runtime.clock.setSpeed(speed)
      reportedOrphans.clear()
      set(runtime)
      publish()
    },
  }
})

// Categories change the colors and the legend, never the grid
useCategoryStore.subscribe((state, prev) => {
  if (state.table !== prev.table) useSandStore.getState().refresh()
})
