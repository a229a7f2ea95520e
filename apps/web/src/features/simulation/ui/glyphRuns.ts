import type { FrameCell } from '@/features/simulation/engine/api/types'

export interface GlyphRun {
  text: string
  colorIndex: number
}

/** Merges neighbouring cells of one color so a row renders as a few spans. */
export function toGlyphRuns(row: readonly FrameCell[]): GlyphRun[] {
  const runs: GlyphRun[] = []
  for (const cell of row) {
    const last = runs[runs.length - 1]
    if (last && last.colorIndex === cell.colorIndex) {
      last.text += cell.glyph
    } else {
      runs.push({ text: cell.glyph, colorIndex: cell.colorIndex })
    }
  }
  return runs
}
