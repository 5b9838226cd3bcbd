import type { SettingsRepository } from '@domain/repositories.ts'
import type { StockroomDB } from './database.ts'

export function createSettingsRepository(db: StockroomDB): SettingsRepository {
  const select = db.prepare<[string], { value: string | null }>('SELECT value FROM settings WHERE key = ?')
  const upsert = db.prepare(
    'INSERT INTO settings (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
  )

  return {
    async get(key) {
      return select.get(key)?.value ?? null
    },

    async set(key, value) {
      upsert.run(key, value)
    },
  }
}
