import type { CategoryId, LegendEntry } from '../api/types'
import { resolveColorIndex, type CategoryTable } from '../api/categoryTable'
import { FALLBACK_COLOR_INDEX } from '../elements/palette'
import type { Grid } from '../core/Grid'

export const ORPHANED_LABEL = 'unknown'

/** Grains per category id; null collects grains without one. */
export function countOccupancy(grid: Grid): Map<CategoryId | null, number> {
  const counts = new Map<CategoryId | null, number>()
  grid.forEachGrain((_x, _y, category) => {
    counts.set(category, (counts.get(category) ?? 0) + 1)
  })
  return counts
}

/**
 * Legend rows in display order. Grains whose category is missing from the
 * table are folded into one trailing entry with category null.
 */
export function buildLegend(counts: ReadonlyMap<CategoryId | null, number>, table: CategoryTable): LegendEntry[] {
  const entries: LegendEntry[] = table.ordered().map((category) => ({
    category: category.id,
    name: category.name,
    colorIndex: resolveColorIndex(table, category.id),
    grains: counts.get(category.id) ?? 0,
  }))

  let orphaned = 0
  for (const [id, n] of counts) {
    if (id === null || table.get(id) === undefined) orphaned += n
  }

  if (orphaned > 0) {
    entries.push({ category: null, name: ORPHANED_LABEL, colorIndex: FALLBACK_COLOR_INDEX, grains: orphaned })
  }
  return entries
}
