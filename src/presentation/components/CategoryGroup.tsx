import type { ItemView } from '@application/inventory/itemView.ts'
import type { CategoryGroup as Group } from '@application/inventory/groupItemsByCategory.ts'
import type { ItemFields } from '@infrastructure/api/stockroomApi.ts'
import { ItemRow } from './ItemRow.tsx'

interface CategoryGroupProps {
  group: Group<ItemView>
  onQuantity: (id: number, quantity: string) => Promise<boolean>
  onUpdate: (id: number, fields: Partial<ItemFields>) => Promise<boolean>
  onRemove: (id: number) => Promise<boolean>
}

export function CategoryGroup({ group, ...handlers }: CategoryGroupProps) {
  return (
    <section className="category-group">
      <h2>{group.category}</h2>
      <table className="item-table">
        <thead>
          <tr>
            <th>Item</th>
            <th>Quantity</th>
            <th>Alert at</th>
            <th>Checked</th>
            <th>Task</th>
            <th />
          </tr>
        </thead>
        <tbody>
          {group.items.map((item) => (
            // key on lastChecked so the quantity input resets after a save
            <ItemRow key={`${item.id}-${item.lastChecked ?? ''}`} item={item} {...handlers} />
          ))}
        </tbody>
      </table>
    </section>
  )
}
