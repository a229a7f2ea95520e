/**
 * Grid migration on resize
 *
 * Columns are re-projected proportionally, rows stay anchored to the floor
 * (distance from the bottom row is preserved). When the new grid holds fewer
 * cells than there are grains, the excess is dropped from the outermost
 * columns inwards, top-most grain first, before anything is placed.
 *
 * Growing never collides because both projections are injective, so the
 * layout survives unchanged. Shrinking may collide; a displaced grain takes
 * the nearest free cell above, then below, then in neighbouring columns.
 */

import type { CategoryId, Size } from '../api/types'
import { DegenerateResizeError } from '../errors'
import type { Grid } from './Grid'

export type ResizeResult =
  | { ok: true; grid: Grid; discarded: number }
  | { ok: false; error: DegenerateResizeError }

type StoredGrain = { x: number; y: number; category: CategoryId | null }

export function normalizeDimension(value: number): number | null {
  if (!Number.isFinite(value)) return null
  const n = Math.floor(value)
  return n >= 1 ? n : null
}

// Three typed arrays per cell; a 4K screen in braille is about half a million
export const MAX_GRID_CELLS = 1 << 22

/** Whole-cell size, or null when a side is below 1 or the area exceeds MAX_GRID_CELLS. */
export function normalizeSize(width: number, height: number): Size | null {
  const w = normalizeDimension(width)
  const h = normalizeDimension(height)
  if (w === null || h === null || w * h > MAX_GRID_CELLS) return null
  return { width: w, height: h }
}

// 0, W-1, 1, W-2, ...
export function outermostColumnOrder(width: number): number[] {
  const order: number[] = []
  let left = 0
  let right = width - 1
  while (left <= right) {
    order.push(left)
    if (right !== left) order.push(right)
    left++
    right--
  }
  return order
}

export function migrateGrid(source: Grid, width: number, height: number): ResizeResult {
  const size = normalizeSize(width, height)
  if (size === null) {
    return { ok: false, error: new DegenerateResizeError(width, height) }
  }
  const { width: w, height: h } = size

  if (w === source.width && h === source.height) {
    return { ok: true, grid: source.clone(), discarded: 0 }
  }

  // Per-column stacks, top-most grain first
  const columns: StoredGrain[][] = Array.from({ length: source.width }, () => [])
  let total = 0
  source.forEachGrain((x, y, category) => {
    columns[x].push({ x, y, category })
    total++
  })

  let excess = total - w * h
  let discarded = 0
  for (const x of outermostColumnOrder(source.width)) {
    if (excess <= 0) break
    const dropped = Math.min(excess, columns[x].length)
    columns[x].splice(0, dropped)
    excess -= dropped
    discarded += dropped
  }

  // Bottom row first, left to right
  const survivors = columns.flat().sort((a, b) => b.y - a.y || a.x - b.x)

  const target = source.createEmpty(w, h)
  const dy = h - source.height

  for (const grain of survivors) {
    const tx = Math.min(w - 1, Math.floor((grain.x * w) / source.width))
    const ty = Math.max(0, grain.y + dy)
    const idx = findFreeCell(target, tx, ty)
    if (idx === -1) {
      discarded++
      continue
    }
    target.placeIdx(idx, grain.category)
  }

  return { ok: true, grid: target, discarded }
}

function findFreeInColumn(grid: Grid, x: number, fromY: number): number {
  for (let y = fromY; y >= 0; y--) {
    const idx = grid.index(x, y)
    if (grid.isEmptyIdx(idx)) return idx
  }
  for (let y = fromY + 1; y < grid.height; y++) {
    const idx = grid.index(x, y)
    if (grid.isEmptyIdx(idx)) return idx
  }
  return -1
}

function findFreeCell(grid: Grid, x: number, y: number): number {
  const own = findFreeInColumn(grid, x, y)
  if (own !== -1) return own

  for (let d = 1; d < grid.width; d++) {
    if (x - d >= 0) {
      const idx = findFreeInColumn(grid, x - d, y)
      if (idx !== -1) return idx
    }
    if (x + d < grid.width) {
      const idx = findFreeInColumn(grid, x + d, y)
      if (idx !== -1) return idx
    }
  }
  return -1
}
