/**
 * SandEngine - owns the grid, the pending queue and the PRNG state
 *
 * The host drives it: feed elapsed time, call tick() once per clock step,
 * render() when it wants a frame. No timers, no async work.
 */

import type { Cell, CategoryId, FrameBuffer, LegendEntry, RenderMode, StepOptions, TickReport } from './api/types'
import type { CategoryTable } from './api/categoryTable'
import { resolveSandConfig, type SandConfig } from './config'
import { Grid, type GridSnapshot } from './core/Grid'
import { GrainSpawner } from './core/GrainSpawner'
import { Random } from './core/Random'
import type { DegenerateResizeError } from './errors'
import {
  advanceSpawnCursor,
  chooseSpawnColumn,
  createSpawnCursor,
  settleGrain,
  stepAutomaton,
  type SpawnCursor,
} from './core/Automaton'
import { renderFrame } from './rendering/frameBuffer'
import { buildLegend, countOccupancy } from './rendering/occupancy'
import { debugLog } from '@/core/logging/log'

export interface ISandEngine {
  readonly width: number
  readonly height: number
  readonly frame: number
  readonly grainCount: number
  readonly pendingCount: number
  tick(): TickReport
  recordElapsed(category: CategoryId, seconds: number): number
  enqueue(category: CategoryId, count: number): number
  render(table: CategoryTable, mode?: RenderMode): FrameBuffer
  resize(width: number, height: number): EngineResizeResult
  clear(): void
}

export type EngineResizeResult =
  | { ok: true; width: number; height: number; discarded: number }
  | { ok: false; error: DegenerateResizeError }

export interface SeedResult {
  placed: number
  queued: number
}

export interface ClearCategoryResult {
  removed: number
  dropped: number
}

export class SandEngine implements ISandEngine {
  private grid: Grid
  private readonly spawner: GrainSpawner
  private readonly rng: Random
  private cursor: SpawnCursor
  private readonly stepOptions: StepOptions
  private _frame = 0

  readonly config: Readonly<SandConfig>

  constructor(width: number, height: number, config: SandConfig = resolveSandConfig()) {
    this.config = config
    this.grid = new Grid(width, height)
    this.spawner = new GrainSpawner(config.secondsPerGrain)
    this.rng = new Random(config.seed)
    this.cursor = createSpawnCursor(this.grid.width)
    this.stepOptions = {
      maxGrainsPerTick: config.maxGrainsPerTick,
      spawnPolicy: config.spawnPolicy,
    }
  }

  get width(): number { return this.grid.width }
  get height(): number { return this.grid.height }
  get frame(): number { return this._frame }
  get grainCount(): number { return this.grid.countOccupied() }
  get pendingCount(): number { return this.spawner.pendingCount }

  get randomState(): number { return this.rng.state }
  set randomState(state: number) { this.rng.state = state }

  /** Read-only access for inspection; throws OutOfBoundsError. */
  getCell(x: number, y: number): Cell {
    return this.grid.get(x, y)
  }

  pendingFor(category: CategoryId): number {
    return this.spawner.pendingFor(category)
  }

  totalEnqueued(category: CategoryId): number {
    return this.spawner.totalEnqueued(category)
  }

  trackedSeconds(category: CategoryId): number {
    return this.spawner.trackedSecondsFor(category)
  }

  // === Inputs ===
  enqueue(category: CategoryId, count: number): number {
    return this.spawner.enqueue(category, count)
  }

  recordElapsed(category: CategoryId, seconds: number): number {
    return this.spawner.recordElapsed(category, seconds)
  }

  /**
   * Pre-populates the pile from historical totals. Each grain settles at
   * once under the tick rules, in input order; grains that find no free
   * top cell wait at the front of the queue.
   */
  seed(totals: Iterable<readonly [CategoryId, number]>): SeedResult {
    const grains = this.spawner.seed(totals)
    let placed = 0

    for (; placed < grains.length; placed++) {
      const grain = grains[placed]
      const x = chooseSpawnColumn(this.grid, grain.category, this.stepOptions, this.cursor)
      if (x === -1 || !settleGrain(this.grid, x, grain.category, this.rng)) break
      advanceSpawnCursor(this.grid, this.stepOptions, this.cursor, x)
    }

    const rest = grains.slice(placed)
    this.spawner.requeue(rest)
    if (rest.length > 0) debugLog('[SandEngine] seed overflow, queued', rest.length)
    return { placed, queued: rest.length }
  }

  // === Simulation ===
  tick(): TickReport {
    const report = stepAutomaton(this.grid, this.spawner, this.rng, this.stepOptions, this.cursor)
    this._frame++
    return report
  }

  tickMany(count: number): TickReport {
    const total: TickReport = { spawned: 0, held: 0, moved: 0 }
    for (let i = 0; i < count; i++) {
      const report = this.tick()
      total.spawned += report.spawned
      total.held = report.held
      total.moved += report.moved
    }
    return total
  }

  // === Outputs ===
  render(table: CategoryTable, mode: RenderMode = this.config.renderMode): FrameBuffer {
    return renderFrame(this.grid, table, mode)
  }

  occupancy(): Map<CategoryId | null, number> {
    return countOccupancy(this.grid)
  }

  legend(table: CategoryTable): LegendEntry[] {
    return buildLegend(this.occupancy(), table)
  }

  snapshot(): GridSnapshot {
    return this.grid.toSnapshot()
  }

  // === Lifecycle ===
  /** Swaps in a migrated grid, or leaves everything as it was. */
  resize(width: number, height: number): EngineResizeResult {
    const result = this.grid.resize(width, height)
    if (!result.ok) return { ok: false, error: result.error }

    const widthChanged = result.grid.width !== this.grid.width
    this.grid = result.grid
    if (widthChanged) this.cursor = createSpawnCursor(this.grid.width)
    if (result.discarded > 0) debugLog('[SandEngine] resize discarded grains', result.discarded)
    return { ok: true, width: this.grid.width, height: this.grid.height, discarded: result.discarded }
  }

  clear(): void {
    this.grid.clear()
    this.cursor = createSpawnCursor(this.grid.width)
  }

  clearCategory(category: CategoryId): ClearCategoryResult {
    return {
      removed: this.grid.clearCategory(category),
      dropped: this.spawner.discardPending(category),
    }
  }
}
