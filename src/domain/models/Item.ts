export interface Item {
  id: number
  name: string
  category: string
  quantity: number | null
  unit: string
  alertQuantity: number | null
  lastChecked: string | null   // ISO timestamp, refreshed on every edit
  taskId: string | null        // remote task created for this item
  addedToTask: string | null   // ISO timestamp of the last successful push
}

export interface NewItem {
  name: string
  category: string
  quantity: number | null
  unit: string
  alertQuantity: number | null
}

export type ItemChanges = Partial<Omit<Item, 'id'>>

export function isLowStock(item: Pick<Item, 'quantity' | 'alertQuantity'>): boolean {
  if (item.quantity === null || item.alertQuantity === null) return false
  return item.quantity <= item.alertQuantity
}
