import type { Item, ItemChanges, NewItem } from './models/Item.ts'
import type { CategoryTaskMapping } from './models/CategoryTaskMapping.ts'

export interface ItemRepository {
  listAll(): Promise<Item[]>
  findById(id: number): Promise<Item | undefined>
  findByName(name: string): Promise<Item | undefined>
  /** Items whose quantity is at or below their alert quantity */
  listLowStock(): Promise<Item[]>
  listCategories(): Promise<string[]>
  create(item: NewItem, lastChecked: string): Promise<Item>
  update(id: number, changes: ItemChanges): Promise<Item | undefined>
  remove(id: number): Promise<boolean>
}

export interface SettingsRepository {
  get(key: string): Promise<string | null>
  /** Upsert; a null value clears the setting but keeps the key */
  set(key: string, value: string | null): Promise<void>
}

export interface MappingRepository {
  list(): Promise<CategoryTaskMapping[]>
  findById(id: number): Promise<CategoryTaskMapping | undefined>
  findByCategory(category: string): Promise<CategoryTaskMapping | undefined>
  upsert(mapping: Omit<CategoryTaskMapping, 'id'>): Promise<CategoryTaskMapping>
  remove(id: number): Promise<boolean>
}
