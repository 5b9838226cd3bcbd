import type { Item } from '@domain/models/Item.ts'
import type { TaskDraft } from '@domain/models/TaskList.ts'

function formatDate(iso: string | null): string {
  if (!iso) return 'Never'
  const d = new Date(iso)
  if (Number.isNaN(d.getTime())) return 'Never'
  const year = d.getFullYear()
  const month = String(d.getMonth() + 1).padStart(2, '0')
  const day = String(d.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

function formatAmount(amount: number | null, unit: string): string {
  return `${amount ?? '-'} ${unit}`
}

export function buildTaskDraft(item: Item): TaskDraft {
  return {
    title: item.name,
    notes: [
      `Category: ${item.category}`,
      `Current quantity: ${formatAmount(item.quantity, item.unit)}`,
      `Alert threshold: ${formatAmount(item.alertQuantity, item.unit)}`,
      `Last checked: ${formatDate(item.lastChecked)}`,
    ].join('\n'),
  }
}
