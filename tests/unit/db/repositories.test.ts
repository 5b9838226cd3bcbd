import Database from 'better-sqlite3'
import { describe, expect, it } from 'vitest'
import { createItemRepository, migrate } from '@infrastructure/db/index.ts'
import { createTestDb } from '../../helpers/testDb.ts'

const CHECKED = '2024-03-10T12:00:00.000Z'

describe('migrate', () => {
  it('adds the task columns to an item table from before task sync', async () => {
    const db = new Database(':memory:')
    db.exec(`
      CREATE TABLE item (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        category TEXT NOT NULL,
        quantity INTEGER,
        unit TEXT NOT NULL,
        alert_quantity INTEGER,
        last_checked TEXT
      );
      INSERT INTO item (name, category, quantity, unit, alert_quantity, last_checked)
        VALUES ('Rice', 'Pantry', 2, 'kg', 1, '${CHECKED}');
    `)

    migrate(db)

    const columns = db.prepare<[], { name: string }>('PRAGMA table_info(item)').all().map((c) => c.name)
    expect(columns).toContain('task_id')
    expect(columns).toContain('added_to_task')
    expect(await createItemRepository(db).findByName('Rice')).toMatchObject({
      name: 'Rice',
      quantity: 2,
      taskId: null,
      addedToTask: null,
    })
  })

  it('can run twice', () => {
    const { db } = createTestDb()

    expect(() => migrate(db)).not.toThrow()
  })
})

describe('item repository', () => {
  it('lists low-stock items only when both counts are known', async () => {
    const { items } = createTestDb()
    await items.create({ name: 'Eggs', category: 'Fridge', unit: 'pcs', quantity: 2, alertQuantity: 2 }, CHECKED)
    await items.create({ name: 'Rice', category: 'Pantry', unit: 'kg', quantity: 3, alertQuantity: 1 }, CHECKED)
    await items.create({ name: 'Salt', category: 'Pantry', unit: 'kg', quantity: null, alertQuantity: 1 }, CHECKED)

    expect((await items.listLowStock()).map((i) => i.name)).toEqual(['Eggs'])
  })

  it('lists distinct categories in order', async () => {
    const { items } = createTestDb()
    await items.create({ name: 'Rice', category: 'Pantry', unit: 'kg', quantity: 1, alertQuantity: 1 }, CHECKED)
    await items.create({ name: 'Eggs', category: 'Fridge', unit: 'pcs', quantity: 1, alertQuantity: 1 }, CHECKED)
    await items.create({ name: 'Flour', category: 'Pantry', unit: 'kg', quantity: 1, alertQuantity: 1 }, CHECKED)

    expect(await items.listCategories()).toEqual(['Fridge', 'Pantry'])
  })

  it('only touches the columns it is given', async () => {
    const { items } = createTestDb()
    const rice = await items.create({ name: 'Rice', category: 'Pantry', unit: 'kg', quantity: 1, alertQuantity: 1 }, CHECKED)

    const updated = await items.update(rice.id, { taskId: 'task-1' })

    expect(updated).toEqual({ ...rice, taskId: 'task-1' })
  })

  it('rejects negative counts at the storage level', async () => {
    const { items } = createTestDb()

    await expect(
      items.create({ name: 'Rice', category: 'Pantry', unit: 'kg', quantity: -1, alertQuantity: 1 }, CHECKED),
    ).rejects.toThrow()
  })

  it('returns undefined when updating a missing item', async () => {
    const { items } = createTestDb()

    expect(await items.update(42, { quantity: 1 })).toBeUndefined()
    expect(await items.remove(42)).toBe(false)
  })
})

describe('settings repository', () => {
  it('upserts and clears values', async () => {
    const { settings } = createTestDb()

    expect(await settings.get('default_tasklist_id')).toBeNull()
    await settings.set('default_tasklist_id', 'list-1')
    await settings.set('default_tasklist_id', 'list-2')
    expect(await settings.get('default_tasklist_id')).toBe('list-2')
    await settings.set('default_tasklist_id', null)
    expect(await settings.get('default_tasklist_id')).toBeNull()
  })
})
