export type SandErrorCode = 'OUT_OF_BOUNDS' | 'DEGENERATE_RESIZE'

export abstract class SandEngineError extends Error {
  abstract readonly code: SandErrorCode
}

/**
 * Coordinate access outside the current grid. Always a caller bug:
 * the automaton checks edges with `inBounds` before touching a cell.
 */
export class OutOfBoundsError extends SandEngineError {
  readonly code = 'OUT_OF_BOUNDS'

  constructor(
    readonly x: number,
    readonly y: number,
    readonly width: number,
    readonly height: number
  ) {
    super(`Cell (${x}, ${y}) is outside the ${width}x${height} grid`)
    this.name = 'OutOfBoundsError'
  }
}

export class DegenerateResizeError extends SandEngineError {
  readonly code = 'DEGENERATE_RESIZE'

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    super(`Cannot resize grid to ${width}x${height}`)
    this.name = 'DegenerateResizeError'
  }
}

export type SerializedError = {
  name: string
  message: string
  code?: SandErrorCode
  stack?: string
}

const STACK_MAX_LINES = 30
const STACK_MAX_CHARS = 2000

function sanitizeStack(stack: string): string {
  const lines = stack.split('\n').slice(0, STACK_MAX_LINES)
  const joined = lines.join('\n')
  return joined.length > STACK_MAX_CHARS ? joined.slice(0, STACK_MAX_CHARS) : joined
}

export function serializeError(err: unknown): SerializedError {
  if (err instanceof Error) {
    const stack = typeof err.stack === 'string' && err.stack.length > 0 ? sanitizeStack(err.stack) : undefined
    const serialized: SerializedError = {
      name: err.name.length > 0 ? err.name : 'Error',
      message: err.message,
      stack,
    }
    if (err instanceof SandEngineError) serialized.code = err.code
    return serialized
  }

  if (typeof err === 'string') {
    return { name: 'Error', message: err }
  }

  try {
    return { name: 'Error', message: String(err) }
  } catch {
    return { name: 'Error', message: 'Unknown error' }
  }
}
