/**
 * Core types for the sand engine
 *
 * Category identity is an opaque integer handle. Everything that depends on
 * display order (name, color) is resolved at render time through a
 * CategoryTable, so reordering or renaming never touches the grid.
 */

// ============================================
// CATEGORY IDENTITY
// ============================================
declare const categoryIdBrand: unique symbol

export type CategoryId = number & { readonly [categoryIdBrand]: true }

export const MAX_CATEGORY_ID = 0xFFFFFFFF

export function isCategoryId(value: unknown): value is CategoryId {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_CATEGORY_ID
  )
}

export function categoryId(value: number): CategoryId {
  if (!isCategoryId(value)) {
    throw new RangeError(`Invalid category id: ${String(value)}`)
  }
  return value
}

export interface Category {
  id: CategoryId
  name: string
  description: string
  colorIndex: number
  karmaEffect: number
}

// ============================================
// CELLS & GRAINS
// ============================================
export type EmptyCell = { occupied: false; category: null }
export type OccupiedCell = { occupied: true; category: CategoryId | null }
export type Cell = EmptyCell | OccupiedCell

export const EMPTY_CELL: EmptyCell = Object.freeze({ occupied: false, category: null })

export function grainCell(category: CategoryId | null): OccupiedCell {
  return { occupied: true, category }
}

export interface Grain {
  category: CategoryId
}

// ============================================
// SIMULATION SETTINGS
// ============================================
export type SpawnPolicy = 'round-robin' | 'per-category'

export interface StepOptions {
  maxGrainsPerTick: number
  spawnPolicy: SpawnPolicy
}

export interface TickReport {
  spawned: number
  held: number
  moved: number
}

// ============================================
// RENDER TYPES
// ============================================
export type RenderMode = 'cells' | 'braille'

export interface FrameCell {
  glyph: string
  colorIndex: number
}

export interface FrameBuffer {
  width: number
  height: number
  mode: RenderMode
  rows: FrameCell[][]
  /** Category ids found in the grid that the table could not resolve */
  orphaned: CategoryId[]
}

export interface LegendEntry {
  /** null = grains whose category is unknown or missing */
  category: CategoryId | null
  name: string
  colorIndex: number
  grains: number
}

export interface Size {
  width: number
  height: number
}
