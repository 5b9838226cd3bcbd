import { useState } from 'react'
import { useInventory } from '@presentation/hooks/useInventory.ts'
import { CategoryGroup } from '@presentation/components/CategoryGroup.tsx'
import { AddItemForm } from '@presentation/components/AddItemForm.tsx'
import { Pagination } from '@presentation/components/Pagination.tsx'
import { NoticeBanner } from '@presentation/components/NoticeBanner.tsx'

export function InventoryPage() {
  const inv = useInventory()
  const [syncing, setSyncing] = useState(false)

  const handleSync = async () => {
    setSyncing(true)
    await inv.syncTasks()
    setSyncing(false)
  }

  const categories = inv.inventory?.groups.map((g) => g.category) ?? []

  return (
    <main className="page inventory-page">
      <header className="page-header">
        <h1>Inventory</h1>
        <button onClick={() => void handleSync()} disabled={syncing}>
          {syncing ? 'Syncing...' : 'Sync low stock to Google Tasks'}
        </button>
      </header>

      <NoticeBanner notice={inv.notice} onDismiss={inv.dismissNotice} />

      <AddItemForm categories={categories} onAdd={inv.addItem} />

      {inv.loading && <p className="loading">Loading...</p>}
      {inv.loadError && <p className="error">{inv.loadError}</p>}

      {inv.inventory && inv.inventory.totalItems === 0 && (
        <p className="empty">No items yet. Add the first one above.</p>
      )}

      {inv.inventory?.groups.map((group) => (
        <CategoryGroup
          key={group.category}
          group={group}
          onQuantity={inv.updateQuantity}
          onUpdate={inv.updateItem}
          onRemove={inv.removeItem}
        />
      ))}

      {inv.inventory && (
        <Pagination
          page={inv.inventory.page}
          totalPages={inv.inventory.totalPages}
          hasPrev={inv.inventory.hasPrev}
          hasNext={inv.inventory.hasNext}
          onChange={inv.setPage}
        />
      )}
    </main>
  )
}
