/** Fill an empty database with a small demo inventory */
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { addItem } from '@application/inventory/manageItems.ts'
import { createAppContext } from '@infrastructure/appContext.ts'
import { errorMessage } from '@domain/errors.ts'
import { createLogger } from '@infrastructure/log.ts'
import { loadScriptConfig } from './env.ts'

const log = createLogger('seed')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

async function main(): Promise<void> {
  const ctx = createAppContext(loadScriptConfig())
  try {
    if ((await ctx.items.listAll()).length > 0) {
      log.info(`Database at ${ctx.config.databasePath} already has items, nothing to do`)
      return
    }

    const source = fileURLToPath(new URL('./seed-items.json', import.meta.url))
    const parsed: unknown = JSON.parse(readFileSync(source, 'utf8'))
    if (!Array.isArray(parsed)) throw new Error(`${source} must contain an array of items`)

    const entries: unknown[] = parsed
    let added = 0
    for (const entry of entries) {
      if (!isRecord(entry)) continue
      await addItem(ctx.items, entry)
      added++
    }
    log.info(`Added ${added} items to ${ctx.config.databasePath}`)
  } finally {
    ctx.db.close()
  }
}

main().catch((err: unknown) => {
  log.error('Seeding failed:', errorMessage(err))
  process.exitCode = 1
})
