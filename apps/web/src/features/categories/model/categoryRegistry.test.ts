import { describe, expect, it } from 'vitest'
import { CategoryRegistry, NONE_CATEGORY_ID } from './categoryRegistry'
import { categoryId, type Category } from '@/features/simulation/engine/api/types'
import { FALLBACK_COLOR_INDEX } from '@/features/simulation/engine/elements/palette'

function names(registry: CategoryRegistry): string[] {
  return registry.ordered().map((c) => c.name)
}

function requireId(id: ReturnType<CategoryRegistry['add']>) {
  if (id === null) throw new Error('expected an id')
  return id
}

describe('CategoryRegistry', () => {
  it('starts with the built-in none category', () => {
    const registry = new CategoryRegistry()

    expect(registry.size).toBe(1)
    expect(registry.get(NONE_CATEGORY_ID)).toEqual({
      id: 0,
      name: 'none',
      description: '',
      colorIndex: FALLBACK_COLOR_INDEX,
      karmaEffect: 0,
    })
  })

  it('adds categories with increasing ids and cycling colors', () => {
    const registry = new CategoryRegistry()
    const work = requireId(registry.add('  work  ', 'deep focus'))
    const play = requireId(registry.add('play'))

    expect([work, play]).toEqual([1, 2])
    expect(registry.get(work)).toEqual({ id: 1, name: 'work', description: 'deep focus', colorIndex: 1, karmaEffect: 1 })
    expect(registry.get(play)?.colorIndex).toBe(2)
  })

  it('wraps explicit color indices into the palette', () => {
    const registry = new CategoryRegistry()
    const id = requireId(registry.add('read', '', 14))

    expect(registry.get(id)?.colorIndex).toBe(2)
  })

  it('rejects blank and duplicate names, case-insensitively', () => {
    const registry = new CategoryRegistry()
    registry.add('Work')

    expect(registry.add('   ')).toBeNull()
    expect(registry.add('work')).toBeNull()
    expect(registry.add('NONE')).toBeNull()
    expect(registry.size).toBe(2)
  })

  it('never reuses ids after removal', () => {
    const registry = new CategoryRegistry()
    const work = requireId(registry.add('work'))
    registry.remove(work)

    expect(registry.add('work')).toBe(2)
  })

  it('renames without touching the id', () => {
    const registry = new CategoryRegistry()
    const work = requireId(registry.add('work'))
    registry.add('play')

    expect(registry.rename(work, 'Play')).toBe(false)
    expect(registry.rename(work, 'WORK')).toBe(true)
    expect(registry.get(work)?.name).toBe('WORK')
    expect(registry.rename(NONE_CATEGORY_ID, 'idle')).toBe(false)
  })

  it('protects the none category', () => {
    const registry = new CategoryRegistry()

    expect(registry.remove(NONE_CATEGORY_ID)).toBe(false)
    expect(registry.setColor(NONE_CATEGORY_ID, 3)).toBe(false)
    expect(registry.setKarma(NONE_CATEGORY_ID, -1)).toBe(false)
    expect(registry.setDescription(NONE_CATEGORY_ID, 'idle time')).toBe(true)
  })

  it('validates colors and clamps karma', () => {
    const registry = new CategoryRegistry()
    const work = requireId(registry.add('work'))

    expect(registry.setColor(work, 12)).toBe(false)
    expect(registry.setColor(work, 11)).toBe(true)
    expect(registry.setKarma(work, -5)).toBe(true)
    expect(registry.get(work)).toMatchObject({ colorIndex: 11, karmaEffect: -1 })
  })

  it('reorders below the none category only', () => {
    const registry = new CategoryRegistry()
    const a = requireId(registry.add('a'))
    const b = requireId(registry.add('b'))

    expect(registry.moveUp(a)).toBe(false)
    expect(registry.moveDown(b)).toBe(false)
    expect(registry.moveDown(NONE_CATEGORY_ID)).toBe(false)
    expect(registry.moveUp(b)).toBe(true)
    expect(names(registry)).toEqual(['none', 'b', 'a'])
    expect(registry.moveDown(b)).toBe(true)
    expect(names(registry)).toEqual(['none', 'a', 'b'])
  })

  it('builds a table that follows display order', () => {
    const registry = new CategoryRegistry()
    const a = requireId(registry.add('a'))
    const b = requireId(registry.add('b'))
    registry.moveUp(b)

    const table = registry.toTable()

    expect(table.ordered().map((c) => c.id)).toEqual([0, b, a])
    expect(table.get(a)?.colorIndex).toBe(1)
  })

  it('restores stored categories, skipping reserved and repeated entries', () => {
    const stored: Category[] = [
      { id: categoryId(0), name: 'none', description: '', colorIndex: 0, karmaEffect: 0 },
      { id: categoryId(4), name: 'work', description: '', colorIndex: 3, karmaEffect: 1 },
      { id: categoryId(4), name: 'again', description: '', colorIndex: 3, karmaEffect: 1 },
      { id: categoryId(7), name: 'Work', description: '', colorIndex: 5, karmaEffect: 1 },
      { id: categoryId(5), name: 'None', description: '', colorIndex: 5, karmaEffect: 1 },
    ]

    const registry = CategoryRegistry.fromCategories(stored, 2)

    expect(names(registry)).toEqual(['none', 'work'])
    expect(registry.add('new')).toBe(8)
  })

  it('clones independently', () => {
    const registry = new CategoryRegistry()
    const copy = registry.clone()
    copy.add('work')

    expect(registry.size).toBe(1)
    expect(copy.size).toBe(2)
  })
})
