import { createLogger } from '@infrastructure/log.ts'
import { findStaleItems, type StaleItem } from '@application/inventory/findStaleItems.ts'
import { syncLowStockItems, type SyncDependencies, type SyncResult } from '@application/sync/syncLowStockItems.ts'

export interface ScheduledTaskDependencies extends SyncDependencies {
  staleAfterDays: number
}

export interface ScheduledTaskReport {
  /** null when the task list service is not connected */
  sync: SyncResult | null
  stale: StaleItem[]
}

/** The daily job: push low-stock items, then report items nobody has checked lately */
export async function runScheduledTasks(deps: ScheduledTaskDependencies): Promise<ScheduledTaskReport> {
  const log = deps.logger ?? createLogger('cron')
  const now = deps.now ?? (() => new Date())
  log.info(`Starting scheduled tasks at ${now().toISOString()}`)

  let sync: SyncResult | null = null
  if (!(await deps.tasks.isAuthenticated())) {
    log.warn('Task list integration is not connected. Skipping sync.')
  } else {
    log.info('Syncing low-stock items to the task list...')
    sync = await syncLowStockItems({ ...deps, logger: log })
    log.info(`Synced ${sync.synced} items (${sync.skipped} already up to date)`)
    if (sync.errors.length > 0) {
      log.error(`Errors during sync:\n${sync.errors.join('\n')}`)
    }
  }

  log.info(`Checking for items not checked in over ${deps.staleAfterDays} days...`)
  const stale = findStaleItems(await deps.items.listAll(), now(), deps.staleAfterDays)
  if (stale.length === 0) {
    log.info('No stale items found.')
  } else {
    log.warn(`Found ${stale.length} items not checked in over ${deps.staleAfterDays} days:`)
    for (const { item, daysSinceCheck } of stale) {
      const age = daysSinceCheck === null ? 'never' : `${daysSinceCheck} days ago`
      log.warn(`- ${item.name} (category: ${item.category}) - last checked: ${age}`)
    }
  }

  log.info(`Scheduled tasks completed at ${now().toISOString()}`)
  return { sync, stale }
}
