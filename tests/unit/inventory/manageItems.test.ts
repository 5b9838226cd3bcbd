import { beforeEach, describe, expect, it } from 'vitest'
import {
  addItem,
  listInventory,
  removeItem,
  updateItem,
  updateQuantity,
} from '@application/inventory/manageItems.ts'
import { ConflictError, NotFoundError, ValidationError } from '@domain/errors.ts'
import { DAY_MS } from '@domain/constants/tones.ts'
import type { ItemRepository } from '@domain/repositories.ts'
import { createTestDb } from '../../helpers/testDb.ts'

const NOW = new Date('2024-03-10T12:00:00.000Z')

let items: ItemRepository

beforeEach(() => {
  items = createTestDb().items
})

describe('addItem', () => {
  it('stores the item checked now', async () => {
    const item = await addItem(items, { name: 'Rice', category: 'Pantry', unit: 'kg', quantity: '2', alertQuantity: '1' }, NOW)

    expect(item).toEqual({
      id: item.id,
      name: 'Rice',
      category: 'Pantry',
      unit: 'kg',
      quantity: 2,
      alertQuantity: 1,
      lastChecked: NOW.toISOString(),
      taskId: null,
      addedToTask: null,
    })
    expect(await items.findById(item.id)).toEqual(item)
  })

  it('refuses a duplicate name', async () => {
    await addItem(items, { name: 'Rice', category: 'Pantry', unit: 'kg' }, NOW)

    await expect(addItem(items, { name: 'Rice', category: 'Pantry', unit: 'bags' }, NOW)).rejects.toThrow(
      new ConflictError('An item named "Rice" already exists'),
    )
  })
})

describe('updateItem', () => {
  it('applies the changes and refreshes lastChecked', async () => {
    const created = await addItem(items, { name: 'Rice', category: 'Pantry', unit: 'kg' }, NOW)
    const later = new Date(NOW.getTime() + DAY_MS)

    const updated = await updateItem(items, created.id, { category: 'Grains', alertQuantity: '3' }, later)

    expect(updated).toMatchObject({ name: 'Rice', category: 'Grains', alertQuantity: 3, lastChecked: later.toISOString() })
  })

  it('allows keeping the same name', async () => {
    const created = await addItem(items, { name: 'Rice', category: 'Pantry', unit: 'kg' }, NOW)

    await expect(updateItem(items, created.id, { name: 'Rice' }, NOW)).resolves.toMatchObject({ name: 'Rice' })
  })

  it('refuses to rename onto another item', async () => {
    await addItem(items, { name: 'Rice', category: 'Pantry', unit: 'kg' }, NOW)
    const pasta = await addItem(items, { name: 'Pasta', category: 'Pantry', unit: 'packs' }, NOW)

    await expect(updateItem(items, pasta.id, { name: 'Rice' }, NOW)).rejects.toBeInstanceOf(ConflictError)
  })

  it('reports a missing item', async () => {
    await expect(updateItem(items, 99, { unit: 'g' }, NOW)).rejects.toThrow(new NotFoundError('Item not found'))
  })
})

describe('updateQuantity', () => {
  it('sets the quantity and refreshes lastChecked', async () => {
    const created = await addItem(items, { name: 'Milk', category: 'Fridge', unit: 'l', quantity: '2' }, NOW)
    const later = new Date(NOW.getTime() + 2 * DAY_MS)

    const updated = await updateQuantity(items, created.id, '0', later)

    expect(updated.quantity).toBe(0)
    expect(updated.lastChecked).toBe(later.toISOString())
  })

  it('rejects a non-numeric quantity and leaves the item alone', async () => {
    const created = await addItem(items, { name: 'Milk', category: 'Fridge', unit: 'l', quantity: '2' }, NOW)

    await expect(updateQuantity(items, created.id, 'two', NOW)).rejects.toBeInstanceOf(ValidationError)
    expect((await items.findById(created.id))?.quantity).toBe(2)
  })
})

describe('removeItem', () => {
  it('deletes and returns the item', async () => {
    const created = await addItem(items, { name: 'Milk', category: 'Fridge', unit: 'l' }, NOW)

    const removed = await removeItem(items, created.id)

    expect(removed.name).toBe('Milk')
    expect(await items.findById(created.id)).toBeUndefined()
    await expect(removeItem(items, created.id)).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('listInventory', () => {
  it('decorates each row with its colours', async () => {
    const twoDaysAgo = new Date(NOW.getTime() - 2 * DAY_MS)
    await addItem(items, { name: 'Eggs', category: 'Fridge', unit: 'pcs', quantity: '1', alertQuantity: '2' }, twoDaysAgo)
    await addItem(items, { name: 'Rice', category: 'Pantry', unit: 'kg', quantity: '5', alertQuantity: '1' }, NOW)

    const page = await listInventory(items, { page: 1, pageSize: 50, now: NOW })

    expect(page.totalItems).toBe(2)
    expect(page.groups.map((g) => g.category)).toEqual(['Fridge', 'Pantry'])
    expect(page.groups[0].items[0]).toMatchObject({ name: 'Eggs', rowColor: 'orange', warningColor: 'red' })
    expect(page.groups[1].items[0]).toMatchObject({ name: 'Rice', rowColor: 'green', warningColor: 'green' })
  })
})
