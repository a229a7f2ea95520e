import { beforeEach, describe, expect, it } from 'vitest'
import { useCategoryStore } from './categoryStore'
import { NONE_CATEGORY_ID } from './categoryRegistry'

describe('useCategoryStore', () => {
  beforeEach(() => {
    useCategoryStore.getState().replaceAll([])
  })

  it('publishes a new table when a category is added', () => {
    const before = useCategoryStore.getState().table
    const id = useCategoryStore.getState().addCategory('work')

    const { table, categories } = useCategoryStore.getState()
    expect(id).toBe(1)
    expect(table).not.toBe(before)
    expect(categories.map((c) => c.name)).toEqual(['none', 'work'])
  })

  it('keeps state untouched when an action is rejected', () => {
    const before = useCategoryStore.getState()

    expect(before.removeCategory(NONE_CATEGORY_ID)).toBe(false)
    expect(before.addCategory('')).toBeNull()
    expect(useCategoryStore.getState().registry).toBe(before.registry)
  })

  it('does not mutate a registry already published', () => {
    const first = useCategoryStore.getState().registry
    useCategoryStore.getState().addCategory('work')

    expect(first.size).toBe(1)
  })

  it('reorders and removes', () => {
    const { addCategory } = useCategoryStore.getState()
    const a = addCategory('a')
    const b = addCategory('b')
    if (a === null || b === null) throw new Error('expected ids')

    useCategoryStore.getState().moveUp(b)
    expect(useCategoryStore.getState().categories.map((c) => c.name)).toEqual(['none', 'b', 'a'])

    useCategoryStore.getState().removeCategory(b)
    expect(useCategoryStore.getState().table.get(b)).toBeUndefined()
  })
})
