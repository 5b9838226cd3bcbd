import { useState, useEffect, useCallback } from 'react'
import type { InventoryPage } from '@application/inventory/groupItemsByCategory.ts'
import type { ItemView } from '@application/inventory/itemView.ts'
import * as api from '@infrastructure/api/stockroomApi.ts'
import { useNotice } from './useNotice.ts'

export function useInventory() {
  const [page, setPage] = useState(1)
  const [inventory, setInventory] = useState<InventoryPage<ItemView> | null>(null)
  const [loading, setLoading] = useState(true)
  const [loadError, setLoadError] = useState<string | null>(null)

  const reload = useCallback(async () => {
    try {
      const data = await api.fetchInventory(page)
      setInventory(data)
      setLoadError(null)
      // Deleting the last item on the last page leaves nothing to show
      if (data.page > data.totalPages) setPage(data.totalPages)
    } catch (err) {
      setLoadError(err instanceof Error ? err.message : 'Unknown error')
    } finally {
      setLoading(false)
    }
  }, [page])

  useEffect(() => {
    void reload()
  }, [reload])

  const { notice, run, dismiss } = useNotice(reload)

  const addItem = useCallback((fields: api.ItemFields) => run(() => api.addItem(fields)), [run])
  const updateItem = useCallback(
    (id: number, fields: Partial<api.ItemFields>) => run(() => api.updateItem(id, fields)),
    [run],
  )
  const updateQuantity = useCallback(
    (id: number, quantity: string) => run(() => api.updateQuantity(id, quantity)),
    [run],
  )
  const removeItem = useCallback((id: number) => run(() => api.removeItem(id)), [run])
  const syncTasks = useCallback(() => run(api.syncTasks), [run])

  return {
    page,
    setPage,
    inventory,
    loading,
    loadError,
    notice,
    dismissNotice: dismiss,
    addItem,
    updateItem,
    updateQuantity,
    removeItem,
    syncTasks,
  }
}
