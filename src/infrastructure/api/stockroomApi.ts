import type { CategoryTaskMapping, DefaultTaskList } from '@domain/models/CategoryTaskMapping.ts'
import type { TaskList } from '@domain/models/TaskList.ts'
import type { InventoryPage } from '@application/inventory/groupItemsByCategory.ts'
import type { ItemView } from '@application/inventory/itemView.ts'

export type ResultStatus = 'success' | 'error' | 'partial'

export interface ApiResult {
  status: ResultStatus
  message: string
}

export interface ItemFields {
  name: string
  category: string
  unit: string
  quantity: string
  alertQuantity: string
}

export interface ItemResult extends ApiResult {
  item: ItemView
}

export interface SyncSummary extends ApiResult {
  synced: number
  skipped: number
  errors: string[]
}

export interface SettingsOverview {
  configured: boolean
  authenticated: boolean
  error: string | null
  defaultTasklist: DefaultTaskList | null
  mappings: CategoryTaskMapping[]
  categories: string[]
  tasklists: TaskList[]
}

export class ApiRequestError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
    this.name = 'ApiRequestError'
  }
}

async function request<T>(path: string, method = 'GET', body?: unknown): Promise<T> {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    'X-Requested-With': 'XMLHttpRequest',
  }
  if (body !== undefined) headers['Content-Type'] = 'application/json'

  const res = await fetch(path, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  })
  const data = await res.json().catch(() => ({ message: 'Request failed' }))
  if (!res.ok) {
    throw new ApiRequestError(typeof data.message === 'string' ? data.message : `HTTP ${res.status}`, res.status)
  }
  return data
}

export function fetchInventory(page: number, pageSize?: number): Promise<InventoryPage<ItemView>> {
  const params = new URLSearchParams({ page: String(page) })
  if (pageSize !== undefined) params.set('pageSize', String(pageSize))
  return request(`/api/items?${params}`)
}

export function addItem(fields: ItemFields): Promise<ItemResult> {
  return request('/api/items', 'POST', fields)
}

export function updateItem(id: number, fields: Partial<ItemFields>): Promise<ItemResult> {
  return request(`/api/items/${id}`, 'PUT', fields)
}

export function updateQuantity(id: number, quantity: string): Promise<ItemResult> {
  return request(`/api/items/${id}/quantity`, 'POST', { quantity })
}

export function removeItem(id: number): Promise<ApiResult> {
  return request(`/api/items/${id}`, 'DELETE')
}

/** Resolves with `status: 'partial'` when some items failed */
export function syncTasks(): Promise<SyncSummary> {
  return request('/api/tasks/sync', 'POST')
}

export function fetchSettings(): Promise<SettingsOverview> {
  return request('/api/settings')
}

export function saveCredentials(clientId: string, clientSecret: string): Promise<ApiResult> {
  return request('/api/settings/credentials', 'POST', { clientId, clientSecret })
}

export function removeCredentials(): Promise<ApiResult> {
  return request('/api/settings/credentials', 'DELETE')
}

export function setDefaultTaskList(list: DefaultTaskList): Promise<ApiResult> {
  return request('/api/settings/default-tasklist', 'POST', list)
}

export function saveMapping(mapping: Omit<CategoryTaskMapping, 'id'>): Promise<ApiResult> {
  return request('/api/settings/mappings', 'POST', mapping)
}

export function deleteMapping(id: number): Promise<ApiResult> {
  return request(`/api/settings/mappings/${id}`, 'DELETE')
}

export function disconnect(): Promise<ApiResult> {
  return request('/api/oauth/revoke', 'POST')
}

export function getAuthorizeUrl(): string {
  return '/api/oauth/authorize'
}
