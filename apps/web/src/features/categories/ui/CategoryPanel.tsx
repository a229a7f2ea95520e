import { useState } from 'react'
import type { FormEvent } from 'react'
import { ChevronUp, ChevronDown, Plus, Trash2, Eraser } from 'lucide-react'
import type { Category } from '@/features/simulation/engine/api/types'
import { CATEGORY_PALETTE, paletteColor } from '@/features/simulation/engine/elements/palette'
import { useCategoryStore } from '@/features/categories/model/categoryStore'
import { NONE_CATEGORY_ID } from '@/features/categories/model/categoryRegistry'
import { useSessionStore } from '@/features/sessions/model/sessionStore'
import { useSandStore } from '@/features/simulation/model/sandStore'

const SMALL_BUTTON = 'p-1 rounded hover:bg-[#333] transition-colors disabled:opacity-30'

function ColorSwatches(props: { category: Category }) {
  const { category } = props
  const setColor = useCategoryStore((s) => s.setColor)

  return (
    <div className="flex flex-wrap gap-1 mt-1">
      {CATEGORY_PALETTE.map((color, index) => (
        <button
          key={color}
          onClick={() => setColor(category.id, index)}
          className={`w-4 h-4 rounded-sm ${category.colorIndex === index ? 'ring-2 ring-white' : ''}`}
          style={{ backgroundColor: color }}
          title={`Color ${index + 1}`}
        />
      ))}
    </div>
  )
}

function CategoryRow(props: { category: Category; index: number; count: number }) {
  const { category, index, count } = props
  const { moveUp, moveDown, removeCategory, renameCategory } = useCategoryStore()
  const clearCategory = useSandStore((s) => s.clearCategory)
  const [editing, setEditing] = useState(false)
  const isNone = category.id === NONE_CATEGORY_ID

  const handleRemove = () => {
    if (removeCategory(category.id)) useSessionStore.getState().categoryRemoved(category.id)
  }

  return (
    <li className="px-2 py-2 rounded-lg hover:bg-[#202020]">
      <div className="flex items-center gap-2">
        <button
          onClick={() => setEditing((v) => !v)}
          disabled={isNone}
          className="w-3 h-3 rounded-sm shrink-0"
          style={{ backgroundColor: paletteColor(category.colorIndex) }}
          title="Change color"
        />
        <input
          defaultValue={category.name}
          disabled={isNone}
          onBlur={(e) => {
            if (!renameCategory(category.id, e.currentTarget.value)) e.currentTarget.value = category.name
          }}
          className="flex-1 min-w-0 bg-transparent text-sm outline-none disabled:text-[#808080]"
        />
        <button onClick={() => moveUp(category.id)} disabled={index <= 1} className={SMALL_BUTTON} title="Move up">
          <ChevronUp size={14} />
        </button>
        <button
          onClick={() => moveDown(category.id)}
          disabled={isNone || index + 1 >= count}
          className={SMALL_BUTTON}
          title="Move down"
        >
          <ChevronDown size={14} />
        </button>
        <button onClick={() => clearCategory(category.id)} className={SMALL_BUTTON} title="Remove its grains">
          <Eraser size={14} />
        </button>
        <button onClick={handleRemove} disabled={isNone} className={`${SMALL_BUTTON} text-[#EF4444]`} title="Delete">
          <Trash2 size={14} />
        </button>
      </div>
      {editing && !isNone && <ColorSwatches category={category} />}
    </li>
  )
}

export function CategoryPanel() {
  const categories = useCategoryStore((s) => s.categories)
  const addCategory = useCategoryStore((s) => s.addCategory)
  const [name, setName] = useState('')

  const handleSubmit = (e: FormEvent) => {
    e.preventDefault()
    if (addCategory(name) !== null) setName('')
  }

  return (
    <section className="px-4 py-3">
      <h3 className="text-xs uppercase tracking-wide text-[#808080] mb-2">Categories</h3>
      <ul className="space-y-0.5">
        {categories.map((category, index) => (
          <CategoryRow key={category.id} category={category} index={index} count={categories.length} />
        ))}
      </ul>
      <form onSubmit={handleSubmit} className="mt-3 flex gap-2">
        <input
          value={name}
          onChange={(e) => setName(e.target.value)}
          placeholder="New category"
          className="flex-1 min-w-0 bg-[#252525] text-sm rounded-lg px-2 py-1 border border-[#333] outline-none"
        />
        <button type="submit" className="p-2 rounded-lg bg-[#3B82F6] hover:bg-[#2563EB] transition-colors" title="Add">
          <Plus size={14} />
        </button>
      </form>
    </section>
  )
}
