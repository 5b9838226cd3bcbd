import type { VercelRequest, VercelResponse } from '@vercel/node'
import { errorMessage } from '@domain/errors.ts'
import { requireOAuth } from '@infrastructure/appContext.ts'
import { createLogger } from '@infrastructure/log.ts'
import { getContext } from '../_lib/context.ts'
import { clearStateCookie, getStateCookie } from '../_lib/cookies.ts'
import { queryParam } from '../_lib/request.ts'
import { allowMethods, redirect } from '../_lib/respond.ts'

const log = createLogger('oauth')

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return

  const ctx = getContext()
  const settingsPage = `${ctx.config.appBaseUrl}/settings`

  const denied = queryParam(req, 'error')
  if (denied) {
    clearStateCookie(res)
    return redirect(res, `${settingsPage}?oauth_error=${encodeURIComponent(denied)}`, 302)
  }

  const code = queryParam(req, 'code')
  if (!code) {
    return res.status(400).json({ status: 'error', message: 'Missing authorization code' })
  }

  const state = queryParam(req, 'state')
  const expectedState = getStateCookie(req)
  if (!state || !expectedState || state !== expectedState) {
    return res.status(403).json({ status: 'error', message: 'Invalid OAuth state parameter' })
  }

  try {
    await requireOAuth(ctx).exchangeCode(code)
    clearStateCookie(res)
    // No tokens in the URL; the browser only learns that it worked
    redirect(res, `${settingsPage}?connected=1`, 302)
  } catch (err) {
    log.error('OAuth code exchange failed:', errorMessage(err))
    clearStateCookie(res)
    redirect(res, `${settingsPage}?oauth_error=${encodeURIComponent(errorMessage(err))}`, 302)
  }
}
