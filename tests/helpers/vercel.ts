import { vi } from 'vitest'
import type { VercelRequest, VercelResponse } from '@vercel/node'
import type { AppContext } from '@infrastructure/appContext.ts'
import { TEST_SECRET } from './testDb.ts'

export type Handler = (req: VercelRequest, res: VercelResponse) => unknown

export interface MockResponse {
  statusCode: number
  body: unknown
  headers: Record<string, unknown>
  ended: boolean
  setHeader: (name: string, value: unknown) => MockResponse
  getHeader: (name: string) => unknown
  status: (code: number) => MockResponse
  json: (payload: unknown) => MockResponse
  writeHead: (code: number, headers?: Record<string, unknown>) => MockResponse
  end: () => MockResponse
}

interface RequestOptions {
  method: string
  query?: Record<string, string>
  body?: unknown
  headers?: Record<string, string>
  /** Send the headers a fetch() caller would; false behaves like a plain form post */
  json?: boolean
}

export const JSON_HEADERS = { accept: 'application/json', 'x-requested-with': 'XMLHttpRequest' }

export function createRequest({ method, query = {}, body, headers = {}, json = true }: RequestOptions): VercelRequest {
  return {
    method,
    url: '/api/test',
    query,
    body,
    headers: { ...(json ? JSON_HEADERS : {}), ...headers },
  } as unknown as VercelRequest
}

export function createResponse(): VercelResponse & MockResponse {
  const response: MockResponse = {
    statusCode: 200,
    body: undefined,
    headers: {},
    ended: false,
    setHeader(name, value) {
      this.headers[name.toLowerCase()] = value
      return this
    },
    getHeader(name) {
      return this.headers[name.toLowerCase()]
    },
    status(code) {
      this.statusCode = code
      return this
    },
    json(payload) {
      this.body = payload
      this.ended = true
      return this
    },
    writeHead(code, headers = {}) {
      this.statusCode = code
      for (const [name, value] of Object.entries(headers)) this.setHeader(name, value)
      return this
    },
    end() {
      this.ended = true
      return this
    },
  }

  return response as unknown as VercelResponse & MockResponse
}

export async function call(handler: Handler, options: RequestOptions) {
  const res = createResponse()
  await handler(createRequest(options), res)
  return res
}

export const TEST_ENV: Record<string, string> = {
  DATABASE_PATH: ':memory:',
  SETTINGS_SECRET: TEST_SECRET,
  OAUTH_REDIRECT_URI: 'http://localhost:5173/api/oauth/callback',
  APP_BASE_URL: 'http://localhost:5173',
  ALLOWED_ORIGINS: 'http://localhost:5173',
  CRON_SECRET: 'test-cron-secret',
  LOG_LEVEL: 'error',
}

/** Point the handlers at a fresh in-memory database and return the context they will share */
export async function freshContext(env: Record<string, string | undefined> = TEST_ENV): Promise<AppContext> {
  for (const [key, value] of Object.entries(env)) {
    if (value === undefined) delete process.env[key]
    else process.env[key] = value
  }
  vi.resetModules()
  const { getContext } = await import('../../api/_lib/context.ts')
  return getContext()
}

export function restoreEnv(): void {
  for (const key of Object.keys(TEST_ENV)) delete process.env[key]
}
