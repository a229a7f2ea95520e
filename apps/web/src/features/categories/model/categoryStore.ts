import { create } from 'zustand'
import type { Category, CategoryId } from '@/features/simulation/engine/api/types'
import type { CategoryTable } from '@/features/simulation/engine/api/categoryTable'
import { debugLog } from '@/core/logging/log'
import { CategoryRegistry } from './categoryRegistry'

interface CategoryState {
  registry: CategoryRegistry
  // Derived from registry on every change; components subscribe to these
  categories: Category[]
  table: CategoryTable

  addCategory: (name: string, description?: string, colorIndex?: number) => CategoryId | null
  renameCategory: (id: CategoryId, name: string) => boolean
  setColor: (id: CategoryId, colorIndex: number) => boolean
  setDescription: (id: CategoryId, description: string) => boolean
  setKarma: (id: CategoryId, karmaEffect: number) => boolean
  removeCategory: (id: CategoryId) => boolean
  moveUp: (id: CategoryId) => boolean
  moveDown: (id: CategoryId) => boolean
  replaceAll: (categories: Iterable<Category>, nextId?: number) => void
}

function derive(registry: CategoryRegistry): Pick<CategoryState, 'registry' | 'categories' | 'table'> {
  return { registry, categories: registry.ordered(), table: registry.toTable() }
}

export const useCategoryStore = create<CategoryState>((set, get) => {
  // Applies a mutation to a copy and publishes it only when something changed
  function update<T>(mutate: (registry: CategoryRegistry) => T, changed: (result: T) => boolean): T {
    const next = get().registry.clone()
    const result = mutate(next)
    if (changed(result)) set(derive(next))
    return result
  }

  const applied = (ok: boolean) => ok

  return {
    ...derive(new CategoryRegistry()),

    addCategory: (name, description = '', colorIndex) => {
      const id = update((r) => r.add(name, description, colorIndex), (result) => result !== null)
      if (id === null) debugLog('[categories] rejected name', name)
      return id
    },
    renameCategory: (id, name) => update((r) => r.rename(id, name), applied),
    setColor: (id, colorIndex) => update((r) => r.setColor(id, colorIndex), applied),
    setDescription: (id, description) => update((r) => r.setDescription(id, description), applied),
    setKarma: (id, karmaEffect) => update((r) => r.setKarma(id, karmaEffect), applied),
    removeCategory: (id) => update((r) => r.remove(id), applied),
    moveUp: (id) => update((r) => r.moveUp(id), applied),
    moveDown: (id) => update((r) => r.moveDown(id), applied),
    replaceAll: (categories, nextId) => set(derive(CategoryRegistry.fromCategories(categories, nextId))),
  }
})
