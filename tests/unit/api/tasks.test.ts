import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import { setDefaultTaskList } from '@application/settings/taskListSettings.ts'
import type { AppContext } from '@infrastructure/appContext.ts'
import type { FetchLike } from '@infrastructure/google/googleOAuth.ts'
import { TASKS_API_URL } from '@infrastructure/google/googleTasksClient.ts'
import { call, freshContext, restoreEnv, type Handler } from '../../helpers/vercel.ts'
import { jsonResponse, textResponse } from '../../helpers/fakes.ts'

let ctx: AppContext
let fetchMock: Mock<FetchLike>
let syncHandler: Handler
let cronHandler: Handler

beforeEach(async () => {
  fetchMock = vi.fn<FetchLike>()
  vi.stubGlobal('fetch', fetchMock)
  ctx = await freshContext()
  syncHandler = (await import('../../../api/tasks/sync.ts')).default
  cronHandler = (await import('../../../api/cron.ts')).default
})

afterEach(() => {
  ctx.db.close()
  restoreEnv()
  vi.unstubAllGlobals()
})

async function connectGoogle() {
  const oauth = ctx.oauth
  if (!oauth) throw new Error('oauth is not set up')
  await oauth.saveCredentials('test-client-id', 'test-client-secret')
  fetchMock.mockResolvedValueOnce(jsonResponse({ access_token: 'access-1', refresh_token: 'refresh-1' }))
  await oauth.exchangeCode('code-123')
  fetchMock.mockClear()
}

async function seedLowStock(name: string) {
  return ctx.items.create({ name, category: 'Pantry', unit: 'kg', quantity: 0, alertQuantity: 1 }, new Date().toISOString())
}

describe('POST /api/tasks/sync', () => {
  it('reports an error when Google Tasks is not connected', async () => {
    const res = await call(syncHandler, { method: 'POST' })

    expect(res.statusCode).toBe(200)
    expect(res.body).toEqual({
      status: 'error',
      message: 'Synced 0 items with errors: Task list service is not authenticated',
      synced: 0,
      skipped: 0,
      errors: ['Task list service is not authenticated'],
    })
  })

  it('pushes low-stock items to the default list', async () => {
    await connectGoogle()
    await setDefaultTaskList(ctx.settings, { tasklistId: 'list-1', tasklistName: 'Groceries' })
    const rice = await seedLowStock('Rice')
    fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'task-1' }))

    const res = await call(syncHandler, { method: 'POST' })

    expect(res.body).toEqual({
      status: 'success',
      message: 'Synced 1 items to Google Tasks',
      synced: 1,
      skipped: 0,
      errors: [],
    })
    expect(fetchMock.mock.calls[0][0]).toBe(`${TASKS_API_URL}/lists/list-1/tasks`)
    expect((await ctx.items.findById(rice.id))?.taskId).toBe('task-1')
  })

  it('reports partial success when some items fail', async () => {
    await connectGoogle()
    await setDefaultTaskList(ctx.settings, { tasklistId: 'list-1', tasklistName: 'Groceries' })
    await seedLowStock('Flour')
    await seedLowStock('Rice')
    fetchMock
      .mockResolvedValueOnce(textResponse('quota', 429))
      .mockResolvedValueOnce(jsonResponse({ id: 'task-2' }))

    const res = await call(syncHandler, { method: 'POST' })

    expect(res.body).toMatchObject({
      status: 'partial',
      message: 'Synced 1 items with errors: Failed to create task for Flour: Google Tasks error (429): quota',
      synced: 1,
    })
  })

  it('redirects a form post back to the inventory', async () => {
    const res = await call(syncHandler, { method: 'POST', json: false })

    expect(res.statusCode).toBe(303)
    const location = new URL(String(res.headers.location), 'http://localhost')
    expect(location.pathname).toBe('/')
    expect(location.searchParams.get('status')).toBe('error')
    expect(location.searchParams.get('message')).toBe(
      'Synced 0 items with errors: Task list service is not authenticated',
    )
  })
})

describe('GET /api/cron', () => {
  it('refuses requests without the cron secret', async () => {
    const missing = await call(cronHandler, { method: 'GET' })
    const wrong = await call(cronHandler, { method: 'GET', headers: { authorization: 'Bearer nope' } })

    expect(missing.statusCode).toBe(401)
    expect(wrong.statusCode).toBe(401)
    expect(wrong.body).toEqual({ status: 'error', message: 'Unauthorized' })
  })

  it('runs the scheduled tasks', async () => {
    const salt = await seedLowStock('Salt')
    await ctx.items.update(salt.id, { lastChecked: null })

    const res = await call(cronHandler, { method: 'GET', headers: { authorization: 'Bearer test-cron-secret' } })

    expect(res.statusCode).toBe(200)
    expect(res.body).toEqual({
      status: 'success',
      message: 'Sync skipped: task list not connected',
      sync: null,
      staleItems: [{ id: salt.id, name: 'Salt', category: 'Pantry', daysSinceCheck: null }],
    })
  })

  it('is disabled when no cron secret is configured', async () => {
    ctx.db.close()
    ctx = await freshContext({ DATABASE_PATH: ':memory:', CRON_SECRET: undefined, LOG_LEVEL: 'error' })
    const handler = (await import('../../../api/cron.ts')).default

    const res = await call(handler, { method: 'GET', headers: { authorization: 'Bearer ' } })

    expect(res.statusCode).toBe(500)
    expect(res.body).toEqual({ status: 'error', message: 'CRON_SECRET not configured' })
  })
})
