import type { VercelRequest, VercelResponse } from '@vercel/node'
import { TaskApiError, toAppError } from '@domain/errors.ts'
import { createLogger } from '@infrastructure/log.ts'
import { getContext } from './context.ts'
import { cookieHeaders } from './cookies.ts'
import { setAuthenticatedCors } from './cors.ts'
import { wantsJson } from './request.ts'

export type ResultStatus = 'success' | 'error' | 'partial'

export interface ResultBody {
  status: ResultStatus
  message: string
  [field: string]: unknown
}

interface ResultOptions {
  status: ResultStatus
  message: string
  data?: Record<string, unknown>
  /** Page a form post returns to */
  redirectTo: string
  httpStatus?: number
}

const log = createLogger('api')

export const GENERIC_ERROR = 'Something went wrong'

export function redirect(res: VercelResponse, location: string, statusCode = 303): void {
  res.writeHead(statusCode, { ...cookieHeaders(res), Location: location })
  res.end()
}

/** Page to return a form post to, carrying the outcome for the page to show */
export function flashLocation(redirectTo: string, status: ResultStatus, message: string): string {
  return `${redirectTo}?${new URLSearchParams({ status, message })}`
}

/** `{ status, message, ...data }` for JSON callers, a redirect for form posts */
export function sendResult(req: VercelRequest, res: VercelResponse, options: ResultOptions): void {
  if (!wantsJson(req)) {
    redirect(res, flashLocation(options.redirectTo, options.status, options.message))
    return
  }
  const body: ResultBody = { ...options.data, status: options.status, message: options.message }
  res.status(options.httpStatus ?? (options.status === 'error' ? 400 : 200)).json(body)
}

/**
 * Route boundary: known errors keep their message and status,
 * anything unexpected is logged and answered with a generic 500.
 */
export function sendError(req: VercelRequest, res: VercelResponse, err: unknown, redirectTo: string): void {
  const error = toAppError(err)
  const expected = error.status < 500 || error.code !== 'unknown-error'
  if (expected) {
    log.warn(`${req.method} ${req.url}: ${error.message}`)
  } else {
    log.error(`${req.method} ${req.url} failed:`, err)
  }
  sendResult(req, res, {
    status: 'error',
    message: expected ? error.message : GENERIC_ERROR,
    redirectTo,
    // Upstream statuses describe the task service, not this request
    httpStatus: error instanceof TaskApiError ? 502 : error.status,
  })
}

/** Sets CORS, answers OPTIONS and wrong methods; true when the handler should go on */
export function allowMethods(req: VercelRequest, res: VercelResponse, methods: string[]): boolean {
  // Every later getContext() in the handler reuses the context built here
  let allowedOrigins: string[]
  try {
    allowedOrigins = getContext().config.allowedOrigins
  } catch (err) {
    sendError(req, res, err, '/')
    return false
  }
  setAuthenticatedCors(req, res, allowedOrigins)
  if (req.method === 'OPTIONS') {
    res.status(204).end()
    return false
  }
  if (!req.method || !methods.includes(req.method)) {
    res.setHeader('Allow', methods.join(', '))
    res.status(405).json({ status: 'error', message: 'Method not allowed' })
    return false
  }
  return true
}
