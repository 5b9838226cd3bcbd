import type { CategoryTaskMapping, DefaultTaskList } from '@domain/models/CategoryTaskMapping.ts'
import type { MappingRepository, SettingsRepository } from '@domain/repositories.ts'
import { NotFoundError, ValidationError } from '@domain/errors.ts'

export const DEFAULT_TASKLIST_ID = 'default_tasklist_id'
export const DEFAULT_TASKLIST_NAME = 'default_tasklist_name'

function requireText(value: unknown): string | null {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed === '' ? null : trimmed
}

export async function getDefaultTaskList(settings: SettingsRepository): Promise<DefaultTaskList | null> {
  const tasklistId = await settings.get(DEFAULT_TASKLIST_ID)
  const tasklistName = await settings.get(DEFAULT_TASKLIST_NAME)
  if (!tasklistId || !tasklistName) return null
  return { tasklistId, tasklistName }
}

export async function setDefaultTaskList(
  settings: SettingsRepository,
  input: { tasklistId?: unknown; tasklistName?: unknown },
): Promise<DefaultTaskList> {
  const tasklistId = requireText(input.tasklistId)
  const tasklistName = requireText(input.tasklistName)
  if (!tasklistId || !tasklistName) {
    throw new ValidationError('Task list id and name are both required')
  }
  await settings.set(DEFAULT_TASKLIST_ID, tasklistId)
  await settings.set(DEFAULT_TASKLIST_NAME, tasklistName)
  return { tasklistId, tasklistName }
}

export async function saveMapping(
  mappings: MappingRepository,
  input: { category?: unknown; tasklistId?: unknown; tasklistName?: unknown },
): Promise<CategoryTaskMapping> {
  const category = requireText(input.category)
  const tasklistId = requireText(input.tasklistId)
  const tasklistName = requireText(input.tasklistName)
  if (!category || !tasklistId || !tasklistName) {
    throw new ValidationError('Category, task list id and task list name are all required')
  }
  return mappings.upsert({ category, tasklistId, tasklistName })
}

export async function deleteMapping(mappings: MappingRepository, id: number): Promise<CategoryTaskMapping> {
  const mapping = await mappings.findById(id)
  if (!mapping) throw new NotFoundError('Mapping not found')
  await mappings.remove(id)
  return mapping
}

/** Category mapping first, then the configured default */
export async function resolveTaskList(
  category: string,
  mappings: MappingRepository,
  fallback: DefaultTaskList | null,
): Promise<DefaultTaskList | null> {
  const mapping = await mappings.findByCategory(category)
  if (mapping) return { tasklistId: mapping.tasklistId, tasklistName: mapping.tasklistName }
  return fallback
}
