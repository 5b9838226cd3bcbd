import { useState } from 'react'
import type { ItemView } from '@application/inventory/itemView.ts'
import type { ItemFields } from '@infrastructure/api/stockroomApi.ts'
import { TONE_COLORS } from '@domain/constants/tones.ts'

interface ItemRowProps {
  item: ItemView
  onQuantity: (id: number, quantity: string) => Promise<boolean>
  onUpdate: (id: number, fields: Partial<ItemFields>) => Promise<boolean>
  onRemove: (id: number) => Promise<boolean>
}

function countText(value: number | null): string {
  return value === null ? '' : String(value)
}

export function ItemRow({ item, onQuantity, onUpdate, onRemove }: ItemRowProps) {
  const [quantity, setQuantity] = useState(countText(item.quantity))
  const [editing, setEditing] = useState(false)
  const [draft, setDraft] = useState<Partial<ItemFields>>({})

  const startEdit = () => {
    setDraft({
      name: item.name,
      category: item.category,
      unit: item.unit,
      alertQuantity: countText(item.alertQuantity),
    })
    setEditing(true)
  }

  const saveEdit = async () => {
    if (await onUpdate(item.id, draft)) setEditing(false)
  }

  const confirmRemove = () => {
    if (window.confirm(`Remove ${item.name}?`)) void onRemove(item.id)
  }

  if (editing) {
    return (
      <tr className="item-row editing">
        <td>
          <input value={draft.name ?? ''} onChange={(e) => setDraft({ ...draft, name: e.target.value })} />
        </td>
        <td>
          <input value={draft.category ?? ''} onChange={(e) => setDraft({ ...draft, category: e.target.value })} />
        </td>
        <td>
          <input value={draft.unit ?? ''} onChange={(e) => setDraft({ ...draft, unit: e.target.value })} />
        </td>
        <td>
          <input
            inputMode="numeric"
            value={draft.alertQuantity ?? ''}
            onChange={(e) => setDraft({ ...draft, alertQuantity: e.target.value })}
          />
        </td>
        <td colSpan={2}>
          <button onClick={() => void saveEdit()}>Save</button>
          <button className="secondary" onClick={() => setEditing(false)}>Cancel</button>
        </td>
      </tr>
    )
  }

  return (
    <tr className="item-row" style={{ backgroundColor: TONE_COLORS[item.rowColor] }}>
      <td>{item.name}</td>
      <td>
        <form
          className="quantity-form"
          onSubmit={(e) => {
            e.preventDefault()
            void onQuantity(item.id, quantity)
          }}
        >
          <input
            inputMode="numeric"
            aria-label={`Quantity of ${item.name}`}
            value={quantity}
            onChange={(e) => setQuantity(e.target.value)}
          />
          <span className="unit">{item.unit}</span>
          <button type="submit">Set</button>
        </form>
      </td>
      <td>
        <span className="warning-dot" style={{ backgroundColor: TONE_COLORS[item.warningColor] }} />
        {countText(item.alertQuantity) || '-'}
      </td>
      <td>{item.lastCheckedLabel ?? 'Never'}</td>
      <td>{item.taskId ? 'On list' : ''}</td>
      <td className="row-actions">
        <button className="secondary" onClick={startEdit}>Edit</button>
        <button className="danger" onClick={confirmRemove}>Remove</button>
      </td>
    </tr>
  )
}
