import type { Item } from '@domain/models/Item.ts'
import type { Tone } from '@domain/constants/tones.ts'
import { getRowColor, getWarningColor } from './stockColors.ts'

export interface ItemView extends Item {
  rowColor: Tone
  warningColor: Tone
  lastCheckedLabel: string | null   // "dd/mm"
}

export function formatDayMonth(iso: string | null): string | null {
  if (!iso) return null
  const d = new Date(iso)
  if (Number.isNaN(d.getTime())) return null
  const day = String(d.getDate()).padStart(2, '0')
  const month = String(d.getMonth() + 1).padStart(2, '0')
  return `${day}/${month}`
}

export function toItemView(item: Item, now: Date = new Date()): ItemView {
  return {
    ...item,
    rowColor: getRowColor(item.lastChecked, now),
    warningColor: getWarningColor(item.quantity, item.alertQuantity),
    lastCheckedLabel: formatDayMonth(item.lastChecked),
  }
}
