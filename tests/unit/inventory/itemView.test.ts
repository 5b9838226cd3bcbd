import { describe, expect, it } from 'vitest'
import { formatDayMonth, toItemView } from '@application/inventory/itemView.ts'
import type { Item } from '@domain/models/Item.ts'

describe('formatDayMonth', () => {
  it('formats as day/month in local time', () => {
    expect(formatDayMonth(new Date(2024, 0, 5, 9, 30).toISOString())).toBe('05/01')
    expect(formatDayMonth(new Date(2024, 10, 23, 18, 0).toISOString())).toBe('23/11')
  })

  it('is null without a usable timestamp', () => {
    expect(formatDayMonth(null)).toBeNull()
    expect(formatDayMonth('yesterday')).toBeNull()
  })
})

describe('toItemView', () => {
  it('keeps the item fields and adds the display fields', () => {
    const now = new Date(2024, 2, 10, 12, 0)
    const item: Item = {
      id: 4,
      name: 'Coffee',
      category: 'Pantry',
      quantity: null,
      unit: 'bags',
      alertQuantity: 1,
      lastChecked: null,
      taskId: null,
      addedToTask: null,
    }

    expect(toItemView(item, now)).toEqual({
      ...item,
      rowColor: 'grey',
      warningColor: 'grey',
      lastCheckedLabel: null,
    })
  })
})
