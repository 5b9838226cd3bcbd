import type { VercelRequest } from '@vercel/node'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** First value of a query parameter */
export function queryParam(req: VercelRequest, name: string): string | undefined {
  const value = req.query[name]
  return Array.isArray(value) ? value[0] : value
}

/** Parsed JSON or urlencoded body; anything else reads as empty */
export function readBody(req: VercelRequest): Record<string, unknown> {
  const body: unknown = req.body
  return isRecord(body) ? body : {}
}

/** XHR and fetch callers get JSON; plain form posts get a redirect */
export function wantsJson(req: VercelRequest): boolean {
  if (req.headers['x-requested-with'] === 'XMLHttpRequest') return true
  const accept = req.headers.accept ?? ''
  return accept.includes('application/json')
}
