import type { Category, CategoryId } from './types'
import { FALLBACK_COLOR_INDEX, isCategoryColorIndex } from '../elements/palette'

/**
 * Read-only view of the categories for one frame. Iteration order is the
 * display order; lookups go by id only.
 */
export interface CategoryTable {
  readonly size: number
  get(id: CategoryId): Category | undefined
  ordered(): readonly Category[]
}

export function createCategoryTable(categories: Iterable<Category>): CategoryTable {
  const list: Category[] = []
  const byId = new Map<CategoryId, Category>()

  for (const category of categories) {
    // First entry for an id wins
    if (byId.has(category.id)) continue
    byId.set(category.id, category)
    list.push(category)
  }

  return {
    size: list.length,
    get: (id) => byId.get(id),
    ordered: () => list,
  }
}

export const EMPTY_CATEGORY_TABLE: CategoryTable = createCategoryTable([])

/** Color for a grain's category, or the fallback when it does not resolve. */
export function resolveColorIndex(table: CategoryTable, id: CategoryId | null): number {
  if (id === null) return FALLBACK_COLOR_INDEX
  const category = table.get(id)
  if (!category || !isCategoryColorIndex(category.colorIndex)) return FALLBACK_COLOR_INDEX
  return category.colorIndex
}
