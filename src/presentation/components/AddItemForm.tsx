import { useState } from 'react'
import type { ItemFields } from '@infrastructure/api/stockroomApi.ts'

interface AddItemFormProps {
  categories: string[]
  onAdd: (fields: ItemFields) => Promise<boolean>
}

const EMPTY: ItemFields = { name: '', category: '', unit: '', quantity: '', alertQuantity: '' }

export function AddItemForm({ categories, onAdd }: AddItemFormProps) {
  const [fields, setFields] = useState<ItemFields>(EMPTY)
  const [submitting, setSubmitting] = useState(false)

  const set = (field: keyof ItemFields) => (e: React.ChangeEvent<HTMLInputElement>) =>
    setFields({ ...fields, [field]: e.target.value })

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault()
    setSubmitting(true)
    const added = await onAdd(fields)
    setSubmitting(false)
    if (added) setFields(EMPTY)
  }

  return (
    <form className="add-item-form" onSubmit={(e) => void handleSubmit(e)}>
      <input placeholder="Name" value={fields.name} onChange={set('name')} required />
      <input placeholder="Category" list="category-options" value={fields.category} onChange={set('category')} required />
      <datalist id="category-options">
        {categories.map((c) => <option key={c} value={c} />)}
      </datalist>
      <input placeholder="Quantity" inputMode="numeric" value={fields.quantity} onChange={set('quantity')} />
      <input placeholder="Unit" value={fields.unit} onChange={set('unit')} required />
      <input placeholder="Alert at" inputMode="numeric" value={fields.alertQuantity} onChange={set('alertQuantity')} />
      <button type="submit" disabled={submitting}>{submitting ? 'Adding...' : 'Add item'}</button>
    </form>
  )
}
