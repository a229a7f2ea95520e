import { describe, expect, it } from 'vitest'
import { Grid } from '../core/Grid'
import { createCategoryTable } from '../api/categoryTable'
import { categoryId, grainCell, type Category, type CategoryId } from '../api/types'
import { FALLBACK_COLOR_INDEX } from '../elements/palette'
import { ORPHANED_LABEL, buildLegend, countOccupancy } from './occupancy'

const WORK = categoryId(1)
const PLAY = categoryId(2)
const GONE = categoryId(7)

function category(id: CategoryId, name: string, colorIndex: number): Category {
  return { id, name, description: '', colorIndex, karmaEffect: 1 }
}

describe('countOccupancy', () => {
  it('counts grains per category', () => {
    const grid = new Grid(4, 2)
    grid.set(0, 1, grainCell(WORK))
    grid.set(1, 1, grainCell(WORK))
    grid.set(2, 1, grainCell(PLAY))
    grid.set(3, 1, grainCell(null))

    const counts = countOccupancy(grid)

    expect(counts.get(WORK)).toBe(2)
    expect(counts.get(PLAY)).toBe(1)
    expect(counts.get(null)).toBe(1)
    expect(counts.size).toBe(3)
  })
})

describe('buildLegend', () => {
  it('follows table order and includes empty categories', () => {
    const table = createCategoryTable([category(PLAY, 'play', 3), category(WORK, 'work', 0)])
    const counts = new Map<CategoryId | null, number>([[WORK, 4]])

    expect(buildLegend(counts, table)).toEqual([
      { category: PLAY, name: 'play', colorIndex: 3, grains: 0 },
      { category: WORK, name: 'work', colorIndex: 0, grains: 4 },
    ])
  })

  it('folds unknown and untagged grains into one trailing entry', () => {
    const table = createCategoryTable([category(WORK, 'work', 0)])
    const counts = new Map<CategoryId | null, number>([
      [WORK, 1],
      [GONE, 2],
      [null, 3],
    ])

    const legend = buildLegend(counts, table)

    expect(legend).toHaveLength(2)
    expect(legend[1]).toEqual({ category: null, name: ORPHANED_LABEL, colorIndex: FALLBACK_COLOR_INDEX, grains: 5 })
  })
})
