/**
 * Grid - Structure of Arrays cell storage
 *
 * Cell i lives at: state[i], categories[i], resolved[i]
 *
 * - state: CELL_EMPTY, CELL_TAGGED (grain with a category) or
 *   CELL_UNTAGGED (grain without one)
 * - categories: the CategoryId, meaningful only for CELL_TAGGED
 * - resolved: 1 once the cell was placed or moved into during this tick
 *
 * Public coordinate accessors are bounds-checked and throw OutOfBoundsError.
 * The *Idx accessors are unchecked and reserved for the automaton hot loop.
 */

import { EMPTY_CELL, categoryId, grainCell, type Cell, type CategoryId, type Size } from '../api/types'
import { OutOfBoundsError } from '../errors'
import { MAX_GRID_CELLS, migrateGrid, normalizeSize, type ResizeResult } from './resize'

export const CELL_EMPTY = 0
export const CELL_TAGGED = 1
export const CELL_UNTAGGED = 2

export interface GridSnapshot {
  width: number
  height: number
  state: Uint8Array
  categories: Uint32Array
}

export class Grid {
  private readonly _width: number
  private readonly _height: number
  private readonly state: Uint8Array
  private readonly categories: Uint32Array
  private readonly resolved: Uint8Array

  /** Fractional sides are floored; a side below 1 or more than MAX_GRID_CELLS cells throws. */
  constructor(width: number, height: number) {
    const size = normalizeSize(width, height)
    if (size === null) {
      throw new RangeError(`Grid size must be at least 1x1 and at most ${MAX_GRID_CELLS} cells, got ${width}x${height}`)
    }
    this._width = size.width
    this._height = size.height

    const cells = this._width * this._height
    this.state = new Uint8Array(cells)
    this.categories = new Uint32Array(cells)
    this.resolved = new Uint8Array(cells)
  }

  get width(): number { return this._width }
  get height(): number { return this._height }
  get size(): Size { return { width: this._width, height: this._height } }

  // === Index conversion ===
  index(x: number, y: number): number {
    return y * this._width + x
  }

  inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 && x < this._width &&
      y >= 0 && y < this._height
    )
  }

  // Out-of-bounds counts as blocked, never as free space
  isEmpty(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return false
    return this.state[this.index(x, y)] === CELL_EMPTY
  }

  // === Checked cell access ===
  get(x: number, y: number): Cell {
    const idx = this.checkedIndex(x, y)
    return this.cellAtIdx(idx)
  }

  set(x: number, y: number, cell: Cell): void {
    const idx = this.checkedIndex(x, y)
    if (!cell.occupied) {
      this.clearIdx(idx)
    } else {
      this.placeIdx(idx, cell.category)
    }
  }

  // === Unchecked access (automaton) ===
  isEmptyIdx(idx: number): boolean {
    return this.state[idx] === CELL_EMPTY
  }

  cellAtIdx(idx: number): Cell {
    switch (this.state[idx]) {
      case CELL_TAGGED:
        return grainCell(categoryId(this.categories[idx]))
      case CELL_UNTAGGED:
        return grainCell(null)
      default:
        return EMPTY_CELL
    }
  }

  categoryAtIdx(idx: number): CategoryId | null {
    return this.state[idx] === CELL_TAGGED ? categoryId(this.categories[idx]) : null
  }

  placeIdx(idx: number, category: CategoryId | null): void {
    if (category === null) {
      this.state[idx] = CELL_UNTAGGED
      this.categories[idx] = 0
    } else {
      this.state[idx] = CELL_TAGGED
      this.categories[idx] = category
    }
  }

  clearIdx(idx: number): void {
    this.state[idx] = CELL_EMPTY
    this.categories[idx] = 0
  }

  moveIdx(from: number, to: number): void {
    this.state[to] = this.state[from]
    this.categories[to] = this.categories[from]
    this.resolved[to] = 1
    this.clearIdx(from)
  }

  // === Per-tick resolution flags ===
  isResolvedIdx(idx: number): boolean {
    return this.resolved[idx] === 1
  }

  markResolvedIdx(idx: number): void {
    this.resolved[idx] = 1
  }

  resetResolved(): void {
    this.resolved.fill(0)
  }

  // === Whole-grid operations ===
  countOccupied(): number {
    let n = 0
    for (let i = 0; i < this.state.length; i++) {
      if (this.state[i] !== CELL_EMPTY) n++
    }
    return n
  }

  forEachGrain(callback: (x: number, y: number, category: CategoryId | null) => void): void {
    for (let y = 0; y < this._height; y++) {
      for (let x = 0; x < this._width; x++) {
        const idx = this.index(x, y)
        if (this.state[idx] !== CELL_EMPTY) callback(x, y, this.categoryAtIdx(idx))
      }
    }
  }

  clear(): void {
    this.state.fill(CELL_EMPTY)
    this.categories.fill(0)
    this.resolved.fill(0)
  }

  /** Removes every grain tagged with `category`; returns how many went. */
  clearCategory(category: CategoryId): number {
    let removed = 0
    for (let i = 0; i < this.state.length; i++) {
      if (this.state[i] === CELL_TAGGED && this.categories[i] === category) {
        this.clearIdx(i)
        removed++
      }
    }
    return removed
  }

  createEmpty(width: number, height: number): Grid {
    return new Grid(width, height)
  }

  clone(): Grid {
    const copy = new Grid(this._width, this._height)
    copy.state.set(this.state)
    copy.categories.set(this.categories)
    return copy
  }

  /** Builds a migrated copy; this grid is left untouched. */
  resize(width: number, height: number): ResizeResult {
    return migrateGrid(this, width, height)
  }

  toSnapshot(): GridSnapshot {
    return {
      width: this._width,
      height: this._height,
      state: this.state.slice(),
      categories: this.categories.slice(),
    }
  }

  private checkedIndex(x: number, y: number): number {
    if (!this.inBounds(x, y)) throw new OutOfBoundsError(x, y, this._width, this._height)
    return this.index(x, y)
  }
}
