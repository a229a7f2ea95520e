import { useEffect } from 'react'
import { useSandStore } from '@/features/simulation/model/sandStore'
import { useSessionStore } from '@/features/sessions/model/sessionStore'

/**
 * Drives the pile from requestAnimationFrame: credits session time, then
 * lets the clock decide how many ticks this frame owes.
 */
export function useSandLoop(): void {
  useEffect(() => {
    let rafId = 0

    const loop = (time: number) => {
      useSessionStore.getState().poll(time)
      useSandStore.getState().frame(time)
      rafId = requestAnimationFrame(loop)
    }

    useSandStore.getState().clock.reset()
    rafId = requestAnimationFrame(loop)
    return () => cancelAnimationFrame(rafId)
  }, [])
}
