import { useState } from 'react'
import type { CategoryTaskMapping } from '@domain/models/CategoryTaskMapping.ts'
import type { TaskList } from '@domain/models/TaskList.ts'

interface MappingTableProps {
  mappings: CategoryTaskMapping[]
  categories: string[]
  tasklists: TaskList[]
  onSave: (mapping: Omit<CategoryTaskMapping, 'id'>) => Promise<boolean>
  onDelete: (id: number) => Promise<boolean>
}

export function MappingTable({ mappings, categories, tasklists, onSave, onDelete }: MappingTableProps) {
  const [category, setCategory] = useState('')
  const [tasklistId, setTasklistId] = useState('')

  const unmapped = categories.filter((c) => !mappings.some((m) => m.category === c))

  const handleSave = async (e: React.FormEvent) => {
    e.preventDefault()
    const list = tasklists.find((t) => t.id === tasklistId)
    if (!list) return
    if (await onSave({ category, tasklistId: list.id, tasklistName: list.title })) {
      setCategory('')
      setTasklistId('')
    }
  }

  return (
    <div className="mapping-table">
      <table>
        <thead>
          <tr>
            <th>Category</th>
            <th>Task list</th>
            <th />
          </tr>
        </thead>
        <tbody>
          {mappings.length === 0 && (
            <tr>
              <td colSpan={3} className="empty">No mappings yet; every category uses the default list.</td>
            </tr>
          )}
          {mappings.map((m) => (
            <tr key={m.id}>
              <td>{m.category}</td>
              <td>{m.tasklistName}</td>
              <td>
                <button className="danger" onClick={() => void onDelete(m.id)}>Remove</button>
              </td>
            </tr>
          ))}
        </tbody>
      </table>

      {tasklists.length > 0 && (
        <form className="mapping-form" onSubmit={(e) => void handleSave(e)}>
          <select value={category} onChange={(e) => setCategory(e.target.value)} required>
            <option value="">Category...</option>
            {[...unmapped, ...mappings.map((m) => m.category)].map((c) => (
              <option key={c} value={c}>{c}</option>
            ))}
          </select>
          <select value={tasklistId} onChange={(e) => setTasklistId(e.target.value)} required>
            <option value="">Task list...</option>
            {tasklists.map((t) => (
              <option key={t.id} value={t.id}>{t.title}</option>
            ))}
          </select>
          <button type="submit">Save mapping</button>
        </form>
      )}
    </div>
  )
}
