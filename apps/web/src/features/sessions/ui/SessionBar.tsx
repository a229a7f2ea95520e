import { useEffect, useState } from 'react'
import { Play, Pause, SkipForward, RotateCcw, Timer, Square, LayoutGrid, Type } from 'lucide-react'
import { SPEED_OPTIONS } from '@/features/simulation/engine/timing'
import { categoryId } from '@/features/simulation/engine/api/types'
import { useSandStore } from '@/features/simulation/model/sandStore'
import { useCategoryStore } from '@/features/categories/model/categoryStore'
import { useSessionStore } from '@/features/sessions/model/sessionStore'
import { formatDuration } from '@/features/sessions/model/formatDuration'

const ICON_BUTTON = 'p-2 rounded-lg hover:bg-[#252525] transition-colors disabled:opacity-50'

function useElapsedSeconds(startedAtMs: number | null): number {
  const [nowMs, setNowMs] = useState(() => performance.now())

  useEffect(() => {
    if (startedAtMs === null) return
    const id = window.setInterval(() => setNowMs(performance.now()), 500)
    return () => window.clearInterval(id)
  }, [startedAtMs])

  return startedAtMs === null ? 0 : Math.max(0, Math.floor((nowMs - startedAtMs) / 1000))
}

export function SessionBar() {
  const { isPlaying, speed, renderMode, play, pause, step, clear, setSpeed, toggleRenderMode } = useSandStore()
  const categories = useCategoryStore((s) => s.categories)
  const { isRunning, activeCategory, startedAtMs, toggle, switchCategory } = useSessionStore()
  const elapsed = useElapsedSeconds(startedAtMs)

  return (
    <footer className="h-12 bg-[#1A1A1A] border-t border-[#333] flex items-center px-4 gap-4">
      {/* Session */}
      <div className="flex items-center gap-2">
        <button
          onClick={() => toggle()}
          className={`${ICON_BUTTON} ${isRunning ? 'text-[#EF4444]' : 'text-[#22C55E]'}`}
          title={isRunning ? 'Stop session' : 'Start session'}
        >
          {isRunning ? <Square size={18} /> : <Timer size={18} />}
        </button>
        <select
          value={activeCategory}
          onChange={(e) => switchCategory(categoryId(Number(e.target.value)))}
          className="bg-[#252525] text-sm rounded-lg px-2 py-1 border border-[#333]"
        >
          {categories.map((c) => (
            <option key={c.id} value={c.id}>
              {c.name}
            </option>
          ))}
        </select>
        <span className="font-mono text-sm w-16">{formatDuration(elapsed)}</span>
      </div>

      <div className="w-px h-6 bg-[#333]" />

      {/* Playback Controls */}
      <div className="flex items-center gap-1">
        <button onClick={isPlaying ? pause : play} className={ICON_BUTTON} title={isPlaying ? 'Pause' : 'Play'}>
          {isPlaying ? <Pause size={18} /> : <Play size={18} />}
        </button>
        <button onClick={step} disabled={isPlaying} className={ICON_BUTTON} title="Step">
          <SkipForward size={18} />
        </button>
        <button onClick={clear} className={`${ICON_BUTTON} text-[#EF4444]`} title="Clear pile">
          <RotateCcw size={18} />
        </button>
      </div>

      <div className="w-px h-6 bg-[#333]" />

      {/* Speed Control */}
      <div className="flex items-center gap-2">
        <span className="text-sm text-[#A0A0A0]">Speed:</span>
        <div className="flex gap-0.5">
          {SPEED_OPTIONS.map((s) => (
            <button
              key={s}
              onClick={() => setSpeed(s)}
              className={`px-3 py-1 text-sm rounded-lg transition-colors ${
                speed === s ? 'bg-[#3B82F6] text-white' : 'bg-[#252525] text-[#A0A0A0] hover:text-white'
              }`}
            >
              {s}x
            </button>
          ))}
        </div>
      </div>

      <div className="flex-1" />

      <button
        onClick={toggleRenderMode}
        className={ICON_BUTTON}
        title={renderMode === 'braille' ? 'Show whole cells' : 'Show braille dots'}
      >
        {renderMode === 'braille' ? <LayoutGrid size={18} /> : <Type size={18} />}
      </button>
    </footer>
  )
}
