/**
 * AutomatonStep - one deterministic sand tick
 *
 * 1. Spawn: drain up to maxGrainsPerTick grains into the top row. A grain
 *    whose column is occupied is held and requeued, never dropped.
 * 2. Fall: rows bottom-to-top, columns left-to-right. A grain drops straight
 *    down if it can, else to a free lower diagonal; when both diagonals are
 *    free the rng picks one. Edge columns have a single diagonal.
 *
 * Every move marks its destination resolved, and spawned grains are resolved
 * on arrival, so no grain moves twice in one tick. The only randomness is the
 * Random instance passed in.
 */

import type { CategoryId, Grain, StepOptions, TickReport } from '../api/types'
import type { Grid } from './Grid'
import type { Random } from './Random'

export interface SpawnCursor {
  column: number
}

export function createSpawnCursor(width: number): SpawnCursor {
  return { column: Math.floor(width / 2) }
}

/** Fixed column for a category under the 'per-category' policy. */
export function categoryColumn(category: CategoryId, width: number): number {
  return (Math.imul(category, 0x9E3779B1) >>> 0) % width
}

function nextFreeTopColumn(grid: Grid, start: number): number {
  const w = grid.width
  for (let i = 0; i < w; i++) {
    const x = (start + i) % w
    if (grid.isEmptyIdx(x)) return x
  }
  return -1
}

/**
 * Index the grain at (x, y) moves to this tick, or -1 when it stays.
 * Consumes one rng draw only when both diagonals are open.
 */
export function fallTarget(grid: Grid, x: number, y: number, rng: Random): number {
  if (y >= grid.height - 1) return -1

  const w = grid.width
  const below = grid.index(x, y + 1)
  if (grid.isEmptyIdx(below)) return below

  const leftOpen = x > 0 && grid.isEmptyIdx(below - 1)
  const rightOpen = x < w - 1 && grid.isEmptyIdx(below + 1)

  if (leftOpen && rightOpen) return rng.nextBool() ? below - 1 : below + 1
  if (leftOpen) return below - 1
  if (rightOpen) return below + 1
  return -1
}

/** Top-row column for a new grain, or -1 when it has to wait. */
export function chooseSpawnColumn(
  grid: Grid,
  category: CategoryId,
  options: StepOptions,
  cursor: SpawnCursor
): number {
  if (options.spawnPolicy === 'per-category') {
    const x = categoryColumn(category, grid.width)
    // Top row: index === column
    return grid.isEmptyIdx(x) ? x : -1
  }
  return nextFreeTopColumn(grid, cursor.column)
}

export function advanceSpawnCursor(grid: Grid, options: StepOptions, cursor: SpawnCursor, placedAt: number): void {
  if (options.spawnPolicy === 'round-robin') {
    cursor.column = (placedAt + 1) % grid.width
  }
}

function spawnPhase(
  grid: Grid,
  grains: readonly Grain[],
  options: StepOptions,
  cursor: SpawnCursor
): { spawned: number; held: Grain[] } {
  const held: Grain[] = []
  let spawned = 0

  for (const grain of grains) {
    const x = chooseSpawnColumn(grid, grain.category, options, cursor)
    if (x === -1) {
      held.push(grain)
      continue
    }

    grid.placeIdx(x, grain.category)
    grid.markResolvedIdx(x)
    advanceSpawnCursor(grid, options, cursor, x)
    spawned++
  }

  return { spawned, held }
}

function fallPhase(grid: Grid, rng: Random): number {
  let moved = 0

  for (let y = grid.height - 2; y >= 0; y--) {
    for (let x = 0; x < grid.width; x++) {
      const idx = grid.index(x, y)
      if (grid.isEmptyIdx(idx) || grid.isResolvedIdx(idx)) continue

      const target = fallTarget(grid, x, y, rng)
      if (target === -1) continue

      grid.moveIdx(idx, target)
      moved++
    }
  }

  return moved
}

export function stepAutomaton(
  grid: Grid,
  spawner: { drain(max: number): Grain[]; requeue(grains: readonly Grain[]): void },
  rng: Random,
  options: StepOptions,
  cursor: SpawnCursor
): TickReport {
  grid.resetResolved()

  const grains = spawner.drain(options.maxGrainsPerTick)
  const { spawned, held } = spawnPhase(grid, grains, options, cursor)
  spawner.requeue(held)

  const moved = fallPhase(grid, rng)

  return { spawned, held: held.length, moved }
}

/**
 * Drops one grain into column x and lets it fall until it rests, using the
 * same rules as a tick. Returns false when the top cell is taken.
 */
export function settleGrain(grid: Grid, x: number, category: CategoryId | null, rng: Random): boolean {
  let idx = grid.index(x, 0)
  if (!grid.isEmptyIdx(idx)) return false

  grid.placeIdx(idx, category)
  let cx = x
  let cy = 0
  for (;;) {
    const target = fallTarget(grid, cx, cy, rng)
    if (target === -1) return true
    grid.moveIdx(idx, target)
    idx = target
    cx = target % grid.width
    cy = Math.floor(target / grid.width)
  }
}
