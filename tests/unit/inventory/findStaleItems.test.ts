import { describe, expect, it } from 'vitest'
import { findStaleItems } from '@application/inventory/findStaleItems.ts'
import { DAY_MS } from '@domain/constants/tones.ts'
import type { Item } from '@domain/models/Item.ts'

const NOW = new Date('2024-03-10T12:00:00.000Z')

function item(id: number, name: string, lastChecked: string | null): Item {
  return {
    id,
    name,
    category: 'Pantry',
    quantity: 1,
    unit: 'pcs',
    alertQuantity: 1,
    lastChecked,
    taskId: null,
    addedToTask: null,
  }
}

function ago(days: number): string {
  return new Date(NOW.getTime() - days * DAY_MS).toISOString()
}

describe('findStaleItems', () => {
  it('reports items never checked with no age', () => {
    const stale = findStaleItems([item(1, 'Salt', null)], NOW, 7)

    expect(stale).toEqual([{ item: item(1, 'Salt', null), daysSinceCheck: null }])
  })

  it('includes items checked exactly at the cutoff', () => {
    const stale = findStaleItems([item(1, 'Salt', ago(7))], NOW, 7)

    expect(stale.map((s) => s.daysSinceCheck)).toEqual([7])
  })

  it('skips recently checked items', () => {
    const stale = findStaleItems([item(1, 'Salt', ago(6.5)), item(2, 'Sugar', ago(12))], NOW, 7)

    expect(stale.map((s) => [s.item.name, s.daysSinceCheck])).toEqual([['Sugar', 12]])
  })

  it('honours a custom window', () => {
    expect(findStaleItems([item(1, 'Salt', ago(2))], NOW, 1)).toHaveLength(1)
    expect(findStaleItems([item(1, 'Salt', ago(2))], NOW, 3)).toHaveLength(0)
  })
})
