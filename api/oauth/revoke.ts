import type { VercelRequest, VercelResponse } from '@vercel/node'
import { requireOAuth } from '@infrastructure/appContext.ts'
import { getContext } from '../_lib/context.ts'
import { allowMethods, sendError, sendResult } from '../_lib/respond.ts'

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return

  try {
    await requireOAuth(getContext()).revokeToken()
    sendResult(req, res, { status: 'success', message: 'Disconnected from Google Tasks', redirectTo: '/settings' })
  } catch (err) {
    sendError(req, res, err, '/settings')
  }
}
