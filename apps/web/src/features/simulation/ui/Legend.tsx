import { paletteColor } from '@/features/simulation/engine/elements/palette'
import { useSandStore } from '@/features/simulation/model/sandStore'

export function Legend() {
  const legend = useSandStore((s) => s.legend)
  const grainCount = useSandStore((s) => s.grainCount)
  const pendingCount = useSandStore((s) => s.pendingCount)

  return (
    <section className="px-4 py-3 border-t border-[#333]">
      <h3 className="text-xs uppercase tracking-wide text-[#808080] mb-2">Pile</h3>
      <ul className="space-y-1 text-sm">
        {legend.map((entry) => (
          <li key={entry.category ?? 'unknown'} className="flex items-center gap-2">
            <span className="w-2.5 h-2.5 rounded-sm" style={{ backgroundColor: paletteColor(entry.colorIndex) }} />
            <span className="flex-1 truncate">{entry.name}</span>
            <span className="font-mono text-[#A0A0A0]">{entry.grains}</span>
          </li>
        ))}
      </ul>
      <div className="mt-3 flex justify-between text-xs text-[#808080]">
        <span>Grains: <span className="font-mono">{grainCount}</span></span>
        <span>Queued: <span className="font-mono">{pendingCount}</span></span>
      </div>
    </section>
  )
}
