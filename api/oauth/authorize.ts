import type { VercelRequest, VercelResponse } from '@vercel/node'
import { randomBytes } from 'crypto'
import { errorMessage } from '@domain/errors.ts'
import { requireOAuth } from '@infrastructure/appContext.ts'
import { createLogger } from '@infrastructure/log.ts'
import { getContext } from '../_lib/context.ts'
import { setStateCookie } from '../_lib/cookies.ts'
import { allowMethods, redirect } from '../_lib/respond.ts'

const log = createLogger('oauth')

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return

  const ctx = getContext()
  try {
    // CSRF state nonce, checked again in the callback
    const state = randomBytes(16).toString('hex')
    const authorizeUrl = await requireOAuth(ctx).getAuthorizationUrl(state)
    setStateCookie(res, state)
    redirect(res, authorizeUrl, 302)
  } catch (err) {
    log.warn('Cannot start OAuth flow:', errorMessage(err))
    redirect(res, `${ctx.config.appBaseUrl}/settings?oauth_error=${encodeURIComponent(errorMessage(err))}`, 302)
  }
}
