import type { CategoryTaskMapping } from '@domain/models/CategoryTaskMapping.ts'
import type { MappingRepository } from '@domain/repositories.ts'
import type { StockroomDB } from './database.ts'

interface MappingRow {
  id: number
  category: string
  tasklist_id: string
  tasklist_name: string
}

function toMapping(row: MappingRow): CategoryTaskMapping {
  return {
    id: row.id,
    category: row.category,
    tasklistId: row.tasklist_id,
    tasklistName: row.tasklist_name,
  }
}

export function createMappingRepository(db: StockroomDB): MappingRepository {
  const byId = db.prepare<[number], MappingRow>('SELECT * FROM category_task_mapping WHERE id = ?')
  const byCategory = db.prepare<[string], MappingRow>('SELECT * FROM category_task_mapping WHERE category = ?')

  return {
    async list() {
      return db.prepare<[], MappingRow>('SELECT * FROM category_task_mapping ORDER BY category').all().map(toMapping)
    },

    async findById(id) {
      const row = byId.get(id)
      return row ? toMapping(row) : undefined
    },

    async findByCategory(category) {
      const row = byCategory.get(category)
      return row ? toMapping(row) : undefined
    },

    async upsert({ category, tasklistId, tasklistName }) {
      db.prepare(
        `INSERT INTO category_task_mapping (category, tasklist_id, tasklist_name) VALUES (?, ?, ?)
         ON CONFLICT(category) DO UPDATE SET tasklist_id = excluded.tasklist_id, tasklist_name = excluded.tasklist_name`,
      ).run(category, tasklistId, tasklistName)
      const row = byCategory.get(category)
      if (!row) throw new Error(`Mapping for ${category} vanished after upsert`)
      return toMapping(row)
    },

    async remove(id) {
      return db.prepare('DELETE FROM category_task_mapping WHERE id = ?').run(id).changes > 0
    },
  }
}
