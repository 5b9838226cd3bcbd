import type { VercelRequest, VercelResponse } from '@vercel/node'

/**
 * CORS for cookie-carrying endpoints: only ALLOWED_ORIGINS get an
 * Access-Control-Allow-Origin header, so other origins are blocked by the browser.
 */
export function setAuthenticatedCors(req: VercelRequest, res: VercelResponse, allowedOrigins: string[]): void {
  const origin = req.headers.origin ?? ''
  if (allowedOrigins.includes(origin)) {
    res.setHeader('Access-Control-Allow-Origin', origin)
    res.setHeader('Vary', 'Origin')
  }
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS')
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Requested-With')
  res.setHeader('Access-Control-Allow-Credentials', 'true')
}
