import type { Item } from '@domain/models/Item.ts'
import type { ItemRepository } from '@domain/repositories.ts'
import { ConflictError, NotFoundError } from '@domain/errors.ts'
import { groupItemsByCategory, type InventoryPage } from './groupItemsByCategory.ts'
import { toItemView, type ItemView } from './itemView.ts'
import { parseItemChanges, parseNewItem, parseQuantity, type ItemInput } from './parseItemInput.ts'

export async function listInventory(
  items: ItemRepository,
  options: { page?: unknown; pageSize?: unknown; now?: Date } = {},
): Promise<InventoryPage<ItemView>> {
  const now = options.now ?? new Date()
  const all = await items.listAll()
  const page = groupItemsByCategory(all, options.page, options.pageSize)
  return {
    ...page,
    groups: page.groups.map((group) => ({
      category: group.category,
      items: group.items.map((item) => toItemView(item, now)),
    })),
  }
}

async function requireItem(items: ItemRepository, id: number): Promise<Item> {
  const item = await items.findById(id)
  if (!item) throw new NotFoundError('Item not found')
  return item
}

async function assertNameFree(items: ItemRepository, name: string, ownId?: number): Promise<void> {
  const existing = await items.findByName(name)
  if (existing && existing.id !== ownId) {
    throw new ConflictError(`An item named "${name}" already exists`)
  }
}

export async function addItem(items: ItemRepository, input: ItemInput, now: Date = new Date()): Promise<Item> {
  const item = parseNewItem(input)
  await assertNameFree(items, item.name)
  return items.create(item, now.toISOString())
}

export async function updateItem(
  items: ItemRepository,
  id: number,
  input: ItemInput,
  now: Date = new Date(),
): Promise<Item> {
  const changes = parseItemChanges(input)
  await requireItem(items, id)
  if (changes.name) await assertNameFree(items, changes.name, id)

  const updated = await items.update(id, { ...changes, lastChecked: now.toISOString() })
  if (!updated) throw new NotFoundError('Item not found')
  return updated
}

export async function updateQuantity(
  items: ItemRepository,
  id: number,
  rawQuantity: unknown,
  now: Date = new Date(),
): Promise<Item> {
  const quantity = parseQuantity(rawQuantity)
  await requireItem(items, id)

  const updated = await items.update(id, { quantity, lastChecked: now.toISOString() })
  if (!updated) throw new NotFoundError('Item not found')
  return updated
}

export async function removeItem(items: ItemRepository, id: number): Promise<Item> {
  const item = await requireItem(items, id)
  await items.remove(id)
  return item
}
