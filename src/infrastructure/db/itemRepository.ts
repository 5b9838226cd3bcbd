import type { Item, ItemChanges, NewItem } from '@domain/models/Item.ts'
import type { ItemRepository } from '@domain/repositories.ts'
import type { StockroomDB } from './database.ts'

interface ItemRow {
  id: number
  name: string
  category: string
  quantity: number | null
  unit: string
  alert_quantity: number | null
  last_checked: string | null
  task_id: string | null
  added_to_task: string | null
}

const COLUMN_FOR: Record<keyof ItemChanges, keyof ItemRow> = {
  name: 'name',
  category: 'category',
  quantity: 'quantity',
  unit: 'unit',
  alertQuantity: 'alert_quantity',
  lastChecked: 'last_checked',
  taskId: 'task_id',
  addedToTask: 'added_to_task',
}

function isChangeField(key: string): key is keyof ItemChanges {
  return key in COLUMN_FOR
}

function toItem(row: ItemRow): Item {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    quantity: row.quantity,
    unit: row.unit,
    alertQuantity: row.alert_quantity,
    lastChecked: row.last_checked,
    taskId: row.task_id,
    addedToTask: row.added_to_task,
  }
}

export function createItemRepository(db: StockroomDB): ItemRepository {
  const byId = db.prepare<[number], ItemRow>('SELECT * FROM item WHERE id = ?')
  const byName = db.prepare<[string], ItemRow>('SELECT * FROM item WHERE name = ?')

  return {
    async listAll() {
      return db.prepare<[], ItemRow>('SELECT * FROM item ORDER BY category, name').all().map(toItem)
    },

    async findById(id) {
      const row = byId.get(id)
      return row ? toItem(row) : undefined
    },

    async findByName(name) {
      const row = byName.get(name)
      return row ? toItem(row) : undefined
    },

    async listLowStock() {
      return db
        .prepare<[], ItemRow>(
          'SELECT * FROM item WHERE quantity IS NOT NULL AND alert_quantity IS NOT NULL AND quantity <= alert_quantity ORDER BY category, name',
        )
        .all()
        .map(toItem)
    },

    async listCategories() {
      return db
        .prepare<[], { category: string }>("SELECT DISTINCT category FROM item WHERE category <> '' ORDER BY category")
        .all()
        .map((row) => row.category)
    },

    async create(item: NewItem, lastChecked: string) {
      const info = db
        .prepare(
          'INSERT INTO item (name, category, quantity, unit, alert_quantity, last_checked) VALUES (?, ?, ?, ?, ?, ?)',
        )
        .run(item.name, item.category, item.quantity, item.unit, item.alertQuantity, lastChecked)
      const row = byId.get(Number(info.lastInsertRowid))
      if (!row) throw new Error(`Item ${item.name} vanished after insert`)
      return toItem(row)
    },

    async update(id, changes) {
      const assignments: string[] = []
      const values: (string | number | null)[] = []
      for (const [key, value] of Object.entries(changes)) {
        if (!isChangeField(key) || value === undefined) continue
        assignments.push(`${COLUMN_FOR[key]} = ?`)
        values.push(value)
      }

      if (assignments.length > 0) {
        db.prepare(`UPDATE item SET ${assignments.join(', ')} WHERE id = ?`).run(...values, id)
      }
      const row = byId.get(id)
      return row ? toItem(row) : undefined
    },

    async remove(id) {
      return db.prepare('DELETE FROM item WHERE id = ?').run(id).changes > 0
    },
  }
}
