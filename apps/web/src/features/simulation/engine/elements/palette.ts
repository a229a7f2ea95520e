// Category colors, indexed by Category.colorIndex
export const CATEGORY_PALETTE: readonly string[] = [
  '#00B050',
  '#80FF00',
  '#FFFF00',
  '#FFCC00',
  '#FF9900',
  '#FF3300',
  '#FF0000',
  '#9900FF',
  '#6633FF',
  '#0000FF',
  '#0099FF',
  '#00FFFF',
]

// Reserved slots after the category colors
export const FALLBACK_COLOR_INDEX = CATEGORY_PALETTE.length
export const BACKGROUND_COLOR_INDEX = CATEGORY_PALETTE.length + 1

const FALLBACK_COLOR = '#FFFFFF'
const BACKGROUND_COLOR = '#0A0A0A'

export const PALETTE: readonly string[] = [...CATEGORY_PALETTE, FALLBACK_COLOR, BACKGROUND_COLOR]

export function isCategoryColorIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < CATEGORY_PALETTE.length
}

export function paletteColor(index: number): string {
  return PALETTE[index] ?? FALLBACK_COLOR
}

export function defaultColorIndex(position: number): number {
  return ((position % CATEGORY_PALETTE.length) + CATEGORY_PALETTE.length) % CATEGORY_PALETTE.length
}
