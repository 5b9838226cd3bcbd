import type { RemoteTask, TaskDraft, TaskList, TaskStatus } from '@domain/models/TaskList.ts'
import { TaskApiError } from '@domain/errors.ts'
import type { TaskGateway } from '@application/sync/taskGateway.ts'
import { createLogger } from '../log.ts'
import type { FetchLike, GoogleOAuth } from './googleOAuth.ts'

export const TASKS_API_URL = 'https://tasks.googleapis.com/tasks/v1'

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE'

const log = createLogger('tasks')

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toStatus(value: unknown): TaskStatus {
  return value === 'completed' ? 'completed' : 'needsAction'
}

/**
 * Google Tasks REST client. A 401 triggers one token refresh and one retry;
 * every other failure becomes a TaskApiError.
 */
export class GoogleTasksClient implements TaskGateway {
  private readonly oauth: GoogleOAuth
  private readonly fetchImpl: FetchLike

  constructor(oauth: GoogleOAuth, fetchImpl?: FetchLike) {
    this.oauth = oauth
    this.fetchImpl = fetchImpl ?? ((input: string, init?: RequestInit) => globalThis.fetch(input, init))
  }

  async isAuthenticated(): Promise<boolean> {
    return (await this.oauth.getToken()) !== null
  }

  private send(method: Method, url: string, accessToken: string, body?: unknown): Promise<Response> {
    return this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${accessToken}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    })
  }

  private async request(method: Method, path: string, body?: unknown): Promise<unknown> {
    const token = await this.oauth.getToken()
    if (!token) throw new TaskApiError('Not authenticated with Google Tasks', 401)

    const url = `${TASKS_API_URL}${path}`
    let response = await this.send(method, url, token.accessToken, body)
    log.debug(`${method} ${path} -> ${response.status}`)

    if (response.status === 401) {
      log.info('Access token rejected, attempting to refresh')
      const refreshed = await this.oauth.refreshToken()
      if (!refreshed) {
        throw new TaskApiError('Access token expired and could not be refreshed', 401)
      }
      response = await this.send(method, url, refreshed.accessToken, body)
    }

    if (!response.ok) {
      const text = await response.text()
      throw new TaskApiError(`Google Tasks error (${response.status}): ${text.slice(0, 200)}`, response.status)
    }

    const text = await response.text()
    return text ? JSON.parse(text) : null
  }

  async listTaskLists(): Promise<TaskList[]> {
    const data = await this.request('GET', '/users/@me/lists')
    if (!isRecord(data) || !Array.isArray(data.items)) return []

    const lists: TaskList[] = []
    for (const entry of data.items) {
      if (isRecord(entry) && typeof entry.id === 'string' && typeof entry.title === 'string') {
        lists.push({ id: entry.id, title: entry.title })
      }
    }
    return lists
  }

  async createTask(tasklistId: string, draft: TaskDraft): Promise<string> {
    const data = await this.request('POST', `/lists/${encodeURIComponent(tasklistId)}/tasks`, {
      title: draft.title,
      notes: draft.notes,
      status: 'needsAction',
    })
    if (!isRecord(data) || typeof data.id !== 'string') {
      throw new TaskApiError('Google Tasks did not return an id for the new task')
    }
    return data.id
  }

  async getTask(tasklistId: string, taskId: string): Promise<RemoteTask> {
    const data = await this.request('GET', `/lists/${encodeURIComponent(tasklistId)}/tasks/${encodeURIComponent(taskId)}`)
    if (!isRecord(data) || typeof data.id !== 'string') {
      throw new TaskApiError(`Task ${taskId} not found`, 404)
    }
    return {
      ...data,
      id: data.id,
      title: typeof data.title === 'string' ? data.title : '',
      notes: typeof data.notes === 'string' ? data.notes : '',
      status: toStatus(data.status),
    }
  }

  /** Read-merge-write, so fields this app does not manage survive the update */
  async updateTask(tasklistId: string, taskId: string, draft: TaskDraft): Promise<void> {
    const existing = await this.getTask(tasklistId, taskId)
    await this.request('PUT', `/lists/${encodeURIComponent(tasklistId)}/tasks/${encodeURIComponent(taskId)}`, {
      ...existing,
      title: draft.title,
      notes: draft.notes,
    })
  }
}
