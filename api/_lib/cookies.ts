import type { VercelRequest, VercelResponse } from '@vercel/node'

const STATE_COOKIE = 'stockroom_oauth_state'

/** Append a Set-Cookie header without overwriting existing ones */
function appendCookie(res: VercelResponse, cookie: string): void {
  const existing = res.getHeader('Set-Cookie')
  if (!existing) {
    res.setHeader('Set-Cookie', [cookie])
  } else if (Array.isArray(existing)) {
    res.setHeader('Set-Cookie', [...existing, cookie])
  } else {
    res.setHeader('Set-Cookie', [String(existing), cookie])
  }
}

export function setStateCookie(res: VercelResponse, state: string): void {
  appendCookie(res, `${STATE_COOKIE}=${state}; HttpOnly; Secure; SameSite=Lax; Path=/api/oauth; Max-Age=300`)
}

export function getStateCookie(req: VercelRequest): string | null {
  const cookies = parseCookies(req.headers.cookie ?? '')
  return cookies[STATE_COOKIE] ?? null
}

export function clearStateCookie(res: VercelResponse): void {
  appendCookie(res, `${STATE_COOKIE}=; HttpOnly; Secure; SameSite=Lax; Path=/api/oauth; Max-Age=0`)
}

/** Set-Cookie headers collected so far, for responses written with writeHead */
export function cookieHeaders(res: VercelResponse): Record<string, string | string[]> {
  const cookies = res.getHeader('Set-Cookie')
  if (cookies === undefined) return {}
  return { 'Set-Cookie': Array.isArray(cookies) ? cookies : String(cookies) }
}

export function parseCookies(header: string): Record<string, string> {
  const result: Record<string, string> = {}
  for (const pair of header.split(';')) {
    const eq = pair.indexOf('=')
    if (eq < 0) continue
    const key = pair.slice(0, eq).trim()
    const value = pair.slice(eq + 1).trim()
    result[key] = value
  }
  return result
}
