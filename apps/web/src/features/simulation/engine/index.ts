/**
 * Sand engine - deterministic falling-sand automaton bound to time categories
 */

export { SandEngine } from './SandEngine'
export type { ISandEngine, EngineResizeResult, SeedResult, ClearCategoryResult } from './SandEngine'
export { SimulationClock } from './SimulationClock'
export { DEFAULT_SAND_CONFIG, resolveSandConfig } from './config'
export type { SandConfig } from './config'
export { SPEED_OPTIONS } from './timing'
export type { SimulationSpeed } from './timing'
export { createCategoryTable, resolveColorIndex, EMPTY_CATEGORY_TABLE } from './api/categoryTable'
export type { CategoryTable } from './api/categoryTable'
export { categoryId, isCategoryId, MAX_CATEGORY_ID } from './api/types'
export type {
  Category,
  CategoryId,
  Cell,
  FrameBuffer,
  FrameCell,
  LegendEntry,
  RenderMode,
  Size,
  SpawnPolicy,
  TickReport,
} from './api/types'
export { CATEGORY_PALETTE, PALETTE, defaultColorIndex, paletteColor } from './elements/palette'
export { DegenerateResizeError, OutOfBoundsError, SandEngineError, serializeError } from './errors'
export { frameToText } from './rendering/frameBuffer'
