import type { Item } from '@domain/models/Item.ts'
import type { ItemRepository, MappingRepository, SettingsRepository } from '@domain/repositories.ts'
import { errorMessage } from '@domain/errors.ts'
import { createLogger, type Logger } from '@infrastructure/log.ts'
import { getDefaultTaskList, resolveTaskList } from '@application/settings/taskListSettings.ts'
import type { TaskGateway } from './taskGateway.ts'
import { buildTaskDraft } from './buildTaskDraft.ts'

export interface SyncDependencies {
  items: ItemRepository
  mappings: MappingRepository
  settings: SettingsRepository
  tasks: TaskGateway
  now?: () => Date
  logger?: Logger
}

export interface SyncResult {
  synced: number
  skipped: number
  errors: string[]
}

/** Synced before and not touched since */
export function isUpToDate(item: Item): boolean {
  if (!item.taskId || !item.addedToTask || !item.lastChecked) return false
  return new Date(item.lastChecked).getTime() <= new Date(item.addedToTask).getTime()
}

/**
 * Push every low-stock item to its task list. Existing tasks are updated,
 * and recreated when the update fails. One item's failure is recorded and the
 * batch carries on.
 */
export async function syncLowStockItems(deps: SyncDependencies): Promise<SyncResult> {
  const { items, mappings, settings, tasks } = deps
  const now = deps.now ?? (() => new Date())
  const log = deps.logger ?? createLogger('sync')
  const result: SyncResult = { synced: 0, skipped: 0, errors: [] }

  if (!(await tasks.isAuthenticated())) {
    result.errors.push('Task list service is not authenticated')
    return result
  }

  const fallback = await getDefaultTaskList(settings)
  const lowStock = await items.listLowStock()
  log.info(`Found ${lowStock.length} items at or below their alert quantity`)

  for (const item of lowStock) {
    if (isUpToDate(item)) {
      result.skipped++
      continue
    }

    try {
      const target = await resolveTaskList(item.category, mappings, fallback)
      if (!target) {
        result.errors.push(`No task list configured for ${item.name} (category ${item.category})`)
        continue
      }

      const draft = buildTaskDraft(item)
      let taskId = item.taskId

      if (taskId) {
        try {
          await tasks.updateTask(target.tasklistId, taskId, draft)
        } catch (err) {
          log.warn(`Updating task for ${item.name} failed, creating a new one: ${errorMessage(err)}`)
          taskId = null
        }
      }

      if (!taskId) {
        try {
          taskId = await tasks.createTask(target.tasklistId, draft)
        } catch (err) {
          result.errors.push(`Failed to create task for ${item.name}: ${errorMessage(err)}`)
          // A task id that no longer updates is dropped so the next run starts fresh
          if (item.taskId) await items.update(item.id, { taskId: null })
          continue
        }
      }

      await items.update(item.id, { taskId, addedToTask: now().toISOString() })
      result.synced++
    } catch (err) {
      log.error(`Error syncing ${item.name}:`, errorMessage(err))
      result.errors.push(`Error syncing ${item.name}: ${errorMessage(err)}`)
    }
  }

  return result
}
