import Database from 'better-sqlite3'
import { mkdirSync } from 'fs'
import path from 'path'
import { createLogger } from '../log.ts'

export type StockroomDB = Database.Database

const log = createLogger('db')

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS item (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    category TEXT NOT NULL,
    quantity INTEGER CHECK (quantity IS NULL OR quantity >= 0),
    unit TEXT NOT NULL,
    alert_quantity INTEGER CHECK (alert_quantity IS NULL OR alert_quantity >= 0),
    last_checked TEXT,
    task_id TEXT,
    added_to_task TEXT
  );
  CREATE TABLE IF NOT EXISTS settings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    key TEXT NOT NULL UNIQUE,
    value TEXT
  );
  CREATE TABLE IF NOT EXISTS category_task_mapping (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    category TEXT NOT NULL UNIQUE,
    tasklist_id TEXT NOT NULL,
    tasklist_name TEXT NOT NULL
  );
`

/** Columns added after the first release of the item table */
const ITEM_COLUMNS_ADDED: { name: string; definition: string }[] = [
  { name: 'task_id', definition: 'TEXT' },
  { name: 'added_to_task', definition: 'TEXT' },
]

export function migrate(db: StockroomDB): void {
  db.exec(SCHEMA)

  const columns = new Set(
    db.prepare<[], { name: string }>('PRAGMA table_info(item)').all().map((c) => c.name),
  )
  for (const column of ITEM_COLUMNS_ADDED) {
    if (!columns.has(column.name)) {
      log.info(`Adding '${column.name}' column to 'item' table`)
      db.exec(`ALTER TABLE item ADD COLUMN ${column.name} ${column.definition}`)
    }
  }
}

/** Open (creating if needed) and migrate the database. ':memory:' opens a throwaway one. */
export function openDatabase(filename: string): StockroomDB {
  if (filename !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(filename)), { recursive: true })
  }
  const db = new Database(filename)
  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')
  migrate(db)
  return db
}
