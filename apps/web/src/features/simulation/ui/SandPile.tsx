import { useRef } from 'react'
import type { FrameCell } from '@/features/simulation/engine/api/types'
import { paletteColor } from '@/features/simulation/engine/elements/palette'
import { useSandStore } from '@/features/simulation/model/sandStore'
import { toGlyphRuns } from './glyphRuns'
import { useGridFit } from './useGridFit'

const PILE_TEXT = 'font-mono text-[14px] leading-[16px] whitespace-pre'

function PileRow({ row }: { row: FrameCell[] }) {
  return (
    <div>
      {toGlyphRuns(row).map((run, i) => (
        <span key={i} style={{ color: paletteColor(run.colorIndex) }}>
          {run.text}
        </span>
      ))}
    </div>
  )
}

export function SandPile() {
  const containerRef = useRef<HTMLDivElement>(null)
  const probeRef = useRef<HTMLSpanElement>(null)
  const frameBuffer = useSandStore((s) => s.frameBuffer)
  const renderMode = useSandStore((s) => s.renderMode)

  useGridFit({ containerRef, probeRef, renderMode })

  return (
    <div ref={containerRef} className="relative w-full h-full overflow-hidden bg-[#0A0A0A]">
      {/* Measures one glyph cell */}
      <span ref={probeRef} aria-hidden className={`${PILE_TEXT} absolute invisible`}>
        █
      </span>
      <div className={`${PILE_TEXT} select-none`}>
        {frameBuffer?.rows.map((row, y) => <PileRow key={y} row={row} />)}
      </div>
    </div>
  )
}
