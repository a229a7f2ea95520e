/**
 * Frame buffer rendering
 *
 * Pure: reads the grid and the category table, returns fresh rows of
 * (glyph, colorIndex). Nothing in the output aliases grid memory, so later
 * ticks never change a frame that was already handed out.
 */

import type { CategoryId, FrameBuffer, FrameCell, RenderMode } from '../api/types'
import { resolveColorIndex, type CategoryTable } from '../api/categoryTable'
import { BACKGROUND_COLOR_INDEX, PALETTE } from '../elements/palette'
import type { Grid } from '../core/Grid'

export const GRAIN_GLYPH = '█'
export const EMPTY_GLYPH = ' '

export const BRAILLE_BASE = 0x2800
export const BRAILLE_DOT_WIDTH = 2
export const BRAILLE_DOT_HEIGHT = 4

// Bit for the dot at [dy][dx] inside a braille cell
const BRAILLE_DOT_BITS: readonly (readonly number[])[] = [
  [0, 3],
  [1, 4],
  [2, 5],
  [6, 7],
]

const BACKGROUND_CELL: FrameCell = { glyph: EMPTY_GLYPH, colorIndex: BACKGROUND_COLOR_INDEX }

function collectOrphan(orphans: Set<CategoryId>, table: CategoryTable, id: CategoryId | null): void {
  if (id !== null && table.get(id) === undefined) orphans.add(id)
}

export function renderCells(args: { grid: Grid; table: CategoryTable }): FrameBuffer {
  const { grid, table } = args
  const orphans = new Set<CategoryId>()
  const rows: FrameCell[][] = []

  for (let y = 0; y < grid.height; y++) {
    const row: FrameCell[] = []
    for (let x = 0; x < grid.width; x++) {
      const idx = grid.index(x, y)
      if (grid.isEmptyIdx(idx)) {
        row.push({ ...BACKGROUND_CELL })
        continue
      }
      const id = grid.categoryAtIdx(idx)
      collectOrphan(orphans, table, id)
      row.push({ glyph: GRAIN_GLYPH, colorIndex: resolveColorIndex(table, id) })
    }
    rows.push(row)
  }

  return {
    width: grid.width,
    height: grid.height,
    mode: 'cells',
    rows,
    orphaned: [...orphans].sort((a, b) => a - b),
  }
}

/**
 * Packs 2x4 blocks of grid cells into braille glyphs. A block takes the
 * color most of its grains resolve to; ties go to the lower color index.
 */
export function renderBraille(args: { grid: Grid; table: CategoryTable }): FrameBuffer {
  const { grid, table } = args
  const orphans = new Set<CategoryId>()
  const width = Math.ceil(grid.width / BRAILLE_DOT_WIDTH)
  const height = Math.ceil(grid.height / BRAILLE_DOT_HEIGHT)
  const counts = new Uint16Array(PALETTE.length)
  const rows: FrameCell[][] = []

  for (let cy = 0; cy < height; cy++) {
    const row: FrameCell[] = []
    for (let cx = 0; cx < width; cx++) {
      counts.fill(0)
      let dots = 0

      for (let dy = 0; dy < BRAILLE_DOT_HEIGHT; dy++) {
        for (let dx = 0; dx < BRAILLE_DOT_WIDTH; dx++) {
          const gx = cx * BRAILLE_DOT_WIDTH + dx
          const gy = cy * BRAILLE_DOT_HEIGHT + dy
          if (gx >= grid.width || gy >= grid.height) continue

          const idx = grid.index(gx, gy)
          if (grid.isEmptyIdx(idx)) continue

          const id = grid.categoryAtIdx(idx)
          collectOrphan(orphans, table, id)
          dots |= 1 << BRAILLE_DOT_BITS[dy][dx]
          counts[resolveColorIndex(table, id)]++
        }
      }

      if (dots === 0) {
        row.push({ ...BACKGROUND_CELL })
        continue
      }

      let colorIndex = 0
      for (let i = 1; i < counts.length; i++) {
        if (counts[i] > counts[colorIndex]) colorIndex = i
      }
      row.push({ glyph: String.fromCodePoint(BRAILLE_BASE + dots), colorIndex })
    }
    rows.push(row)
  }

  return {
    width,
    height,
    mode: 'braille',
    rows,
    orphaned: [...orphans].sort((a, b) => a - b),
  }
}

export function renderFrame(grid: Grid, table: CategoryTable, mode: RenderMode = 'cells'): FrameBuffer {
  return mode === 'braille' ? renderBraille({ grid, table }) : renderCells({ grid, table })
}

export function frameToText(frame: FrameBuffer): string {
  return frame.rows.map((row) => row.map((cell) => cell.glyph).join('')).join('\n')
}
