import { describe, expect, it } from 'vitest'
import { DegenerateResizeError, OutOfBoundsError, serializeError } from './errors'

describe('serializeError', () => {
  it('keeps the code of engine errors', () => {
    const serialized = serializeError(new OutOfBoundsError(5, 1, 4, 3))

    expect(serialized.name).toBe('OutOfBoundsError')
    expect(serialized.message).toBe('Cell (5, 1) is outside the 4x3 grid')
    expect(serialized.code).toBe('OUT_OF_BOUNDS')
  })

  it('names degenerate resizes', () => {
    expect(serializeError(new DegenerateResizeError(0, 3))).toMatchObject({
      name: 'DegenerateResizeError',
      message: 'Cannot resize grid to 0x3',
      code: 'DEGENERATE_RESIZE',
    })
  })

  it('trims long stacks', () => {
    const err = new Error('deep')
    err.stack = Array.from({ length: 100 }, (_, i) => `at frame${i}`).join('\n')

    const stack = serializeError(err).stack ?? ''
    expect(stack.split('\n')).toHaveLength(30)
  })

  it('wraps non-error values', () => {
    expect(serializeError('boom')).toEqual({ name: 'Error', message: 'boom' })
    expect(serializeError(42)).toEqual({ name: 'Error', message: '42' })
  })
})
