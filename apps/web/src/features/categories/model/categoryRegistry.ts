import { categoryId, MAX_CATEGORY_ID, type Category, type CategoryId } from '@/features/simulation/engine/api/types'
import { createCategoryTable, type CategoryTable } from '@/features/simulation/engine/api/categoryTable'
import { FALLBACK_COLOR_INDEX, defaultColorIndex, isCategoryColorIndex } from '@/features/simulation/engine/elements/palette'

export const NONE_CATEGORY_ID = categoryId(0)
export const NONE_CATEGORY_NAME = 'none'

const MIN_KARMA = -1
const MAX_KARMA = 1

function noneCategory(): Category {
  return {
    id: NONE_CATEGORY_ID,
    name: NONE_CATEGORY_NAME,
    description: '',
    colorIndex: FALLBACK_COLOR_INDEX,
    karmaEffect: 0,
  }
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase()
}

/**
 * Categories in display order. The built-in "none" category (id 0) is
 * always first and cannot be renamed, recolored or removed. Ids are handed
 * out once and never reused.
 */
export class CategoryRegistry {
  private readonly byId = new Map<CategoryId, Category>()
  private order: CategoryId[] = []
  private nextId = 1

  constructor() {
    const none = noneCategory()
    this.byId.set(none.id, none)
    this.order.push(none.id)
  }

  /**
   * Rebuilds a registry from stored categories. Entries for id 0, the
   * reserved name, repeated ids or repeated names are skipped.
   */
  static fromCategories(categories: Iterable<Category>, nextId = 1): CategoryRegistry {
    const registry = new CategoryRegistry()
    let maxId = 0

    for (const category of categories) {
      maxId = Math.max(maxId, category.id)
      if (category.id === NONE_CATEGORY_ID || sameName(category.name, NONE_CATEGORY_NAME)) continue
      if (registry.byId.has(category.id) || registry.hasName(category.name)) continue

      registry.byId.set(category.id, { ...category })
      registry.order.push(category.id)
    }

    registry.nextId = Math.max(nextId, maxId + 1, 1)
    return registry
  }

  get size(): number {
    return this.order.length
  }

  get(id: CategoryId): Category | undefined {
    return this.byId.get(id)
  }

  has(id: CategoryId): boolean {
    return this.byId.has(id)
  }

  ordered(): Category[] {
    const list: Category[] = []
    for (const id of this.order) {
      const category = this.byId.get(id)
      if (category) list.push(category)
    }
    return list
  }

  toTable(): CategoryTable {
    return createCategoryTable(this.ordered())
  }

  /** Returns the new id, or null for a blank or taken name. */
  add(name: string, description = '', colorIndex?: number): CategoryId | null {
    const trimmed = name.trim()
    if (trimmed === '' || this.hasName(trimmed)) return null
    if (this.nextId > MAX_CATEGORY_ID) return null

    const id = categoryId(this.nextId++)
    this.byId.set(id, {
      id,
      name: trimmed,
      description,
      colorIndex: defaultColorIndex(colorIndex ?? this.order.length),
      karmaEffect: 1,
    })
    this.order.push(id)
    return id
  }

  rename(id: CategoryId, name: string): boolean {
    const category = this.editable(id)
    const trimmed = name.trim()
    if (!category || trimmed === '' || this.hasName(trimmed, id)) return false

    this.byId.set(id, { ...category, name: trimmed })
    return true
  }

  setColor(id: CategoryId, colorIndex: number): boolean {
    const category = this.editable(id)
    if (!category || !isCategoryColorIndex(colorIndex)) return false

    this.byId.set(id, { ...category, colorIndex })
    return true
  }

  setDescription(id: CategoryId, description: string): boolean {
    const category = this.byId.get(id)
    if (!category) return false

    this.byId.set(id, { ...category, description })
    return true
  }

  setKarma(id: CategoryId, karmaEffect: number): boolean {
    const category = this.editable(id)
    if (!category || !Number.isFinite(karmaEffect)) return false

    const karma = Math.max(MIN_KARMA, Math.min(MAX_KARMA, Math.trunc(karmaEffect)))
    this.byId.set(id, { ...category, karmaEffect: karma })
    return true
  }

  remove(id: CategoryId): boolean {
    if (!this.editable(id)) return false

    this.byId.delete(id)
    this.order = this.order.filter((existing) => existing !== id)
    return true
  }

  moveUp(id: CategoryId): boolean {
    const index = this.order.indexOf(id)
    // Slot 0 belongs to "none"
    if (index <= 1) return false
    this.swap(index - 1, index)
    return true
  }

  moveDown(id: CategoryId): boolean {
    const index = this.order.indexOf(id)
    if (index <= 0 || index + 1 >= this.order.length) return false
    this.swap(index, index + 1)
    return true
  }

  clone(): CategoryRegistry {
    const copy = new CategoryRegistry()
    for (const [id, category] of this.byId) copy.byId.set(id, category)
    copy.order = [...this.order]
    copy.nextId = this.nextId
    return copy
  }

  private editable(id: CategoryId): Category | undefined {
    return id === NONE_CATEGORY_ID ? undefined : this.byId.get(id)
  }

  private hasName(name: string, except?: CategoryId): boolean {
    for (const category of this.byId.values()) {
      if (category.id !== except && sameName(category.name, name)) return true
    }
    return false
  }

  private swap(a: number, b: number): void {
    const tmp = this.order[a]
    this.order[a] = this.order[b]
    this.order[b] = tmp
  }
}
