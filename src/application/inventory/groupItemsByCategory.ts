import type { Item } from '@domain/models/Item.ts'

export const DEFAULT_PAGE = 1
export const DEFAULT_PAGE_SIZE = 50

export interface CategoryGroup<T extends Pick<Item, 'name' | 'category'> = Item> {
  category: string
  items: T[]
}

export interface InventoryPage<T extends Pick<Item, 'name' | 'category'> = Item> {
  page: number
  pageSize: number
  totalItems: number
  totalPages: number
  hasPrev: boolean
  hasNext: boolean
  groups: CategoryGroup<T>[]
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 1 ? value : fallback
}

function compareText(a: string, b: string): number {
  return a.localeCompare(b)
}

/**
 * Group items by category (categories alphabetical, items by name) and return
 * the requested page of the combined sequence. Categories without items on
 * that page are left out; items with an empty category are never listed.
 */
export function groupItemsByCategory<T extends Pick<Item, 'name' | 'category'>>(
  items: readonly T[],
  page: unknown = DEFAULT_PAGE,
  pageSize: unknown = DEFAULT_PAGE_SIZE,
): InventoryPage<T> {
  const currentPage = normalizePositiveInt(page, DEFAULT_PAGE)
  const size = normalizePositiveInt(pageSize, DEFAULT_PAGE_SIZE)

  const byCategory = new Map<string, T[]>()
  for (const item of items) {
    if (!item.category) continue
    const bucket = byCategory.get(item.category)
    if (bucket) bucket.push(item)
    else byCategory.set(item.category, [item])
  }

  const start = (currentPage - 1) * size
  const end = start + size
  const groups: CategoryGroup<T>[] = []
  let runningTotal = 0

  for (const category of [...byCategory.keys()].sort(compareText)) {
    const sorted = [...(byCategory.get(category) ?? [])].sort((a, b) => compareText(a.name, b.name))
    const categoryStart = runningTotal
    runningTotal += sorted.length

    const from = Math.max(start, categoryStart) - categoryStart
    const to = Math.min(end, runningTotal) - categoryStart
    if (to > from) {
      groups.push({ category, items: sorted.slice(from, to) })
    }
  }

  const totalPages = Math.max(1, Math.ceil(runningTotal / size))
  return {
    page: currentPage,
    pageSize: size,
    totalItems: runningTotal,
    totalPages,
    hasPrev: currentPage > 1,
    hasNext: currentPage < totalPages,
    groups,
  }
}
