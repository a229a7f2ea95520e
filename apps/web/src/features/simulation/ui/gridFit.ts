import type { RenderMode, Size } from '@/features/simulation/engine/api/types'
import { BRAILLE_DOT_HEIGHT, BRAILLE_DOT_WIDTH } from '@/features/simulation/engine/rendering/frameBuffer'

/**
 * Grid size that fills `box` with glyphs of size `glyph`. Braille glyphs
 * carry 2x4 grid cells each. Null while the box or glyph has no area.
 */
export function fitGridToBox(box: Size, glyph: Size, mode: RenderMode): Size | null {
  if (!(box.width > 0 && box.height > 0 && glyph.width > 0 && glyph.height > 0)) return null

  const columns = Math.max(1, Math.floor(box.width / glyph.width))
  const rows = Math.max(1, Math.floor(box.height / glyph.height))

  if (mode === 'braille') {
    return { width: columns * BRAILLE_DOT_WIDTH, height: rows * BRAILLE_DOT_HEIGHT }
  }
  return { width: columns, height: rows }
}
