import { useEffect } from 'react'
import type { RefObject } from 'react'
import type { RenderMode } from '@/features/simulation/engine/api/types'
import { useSandStore } from '@/features/simulation/model/sandStore'
import { fitGridToBox } from './gridFit'

/**
 * Keeps the grid sized to its container. The glyph box is measured from a
 * hidden probe span styled like the pile.
 */
export function useGridFit(args: {
  containerRef: RefObject<HTMLElement | null>
  probeRef: RefObject<HTMLElement | null>
  renderMode: RenderMode
}): void {
  const { containerRef, probeRef, renderMode } = args

  useEffect(() => {
    const container = containerRef.current
    const probe = probeRef.current
    if (!container || !probe) return

    const handleResize = () => {
      const box = container.getBoundingClientRect()
      const glyph = probe.getBoundingClientRect()
      const size = fitGridToBox(
        { width: box.width, height: box.height },
        { width: glyph.width, height: glyph.height },
        renderMode
      )
      if (!size) return

      const current = useSandStore.getState().size
      if (current.width === size.width && current.height === size.height) return
      useSandStore.getState().resize(size.width, size.height)
    }

    handleResize()
    const observer = new ResizeObserver(handleResize)
    observer.observe(container)
    return () => observer.disconnect()
  }, [containerRef, probeRef, renderMode])
}
