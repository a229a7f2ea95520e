import { SandPile } from '@/features/simulation/ui/SandPile'
import { Legend } from '@/features/simulation/ui/Legend'
import { useSandLoop } from '@/features/simulation/ui/useSandLoop'
import { SessionBar } from '@/features/sessions/ui/SessionBar'
import { CategoryPanel } from '@/features/categories/ui/CategoryPanel'

function App() {
  useSandLoop()

  return (
    <div className="flex flex-col h-screen bg-[#0D0D0D] text-white overflow-hidden">
      <div className="flex flex-1 overflow-hidden">
        {/* Pile - Center */}
        <main className="flex-1 relative">
          <SandPile />
        </main>

        {/* Right Panel - Categories and legend */}
        <aside className="w-64 bg-[#1A1A1A] border-l border-[#333] flex flex-col overflow-y-auto">
          <CategoryPanel />
          <Legend />
        </aside>
      </div>

      <SessionBar />
    </div>
  )
}

export default App
