import type { VercelRequest, VercelResponse } from '@vercel/node'
import { requireOAuth } from '@infrastructure/appContext.ts'
import { getContext } from '../_lib/context.ts'
import { readBody } from '../_lib/request.ts'
import { allowMethods, sendError, sendResult } from '../_lib/respond.ts'

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST', 'DELETE'])) return

  try {
    const oauth = requireOAuth(getContext())

    if (req.method === 'DELETE') {
      await oauth.removeCredentials()
      return sendResult(req, res, { status: 'success', message: 'Credentials removed', redirectTo: '/settings' })
    }

    const body = readBody(req)
    const clientId = typeof body.clientId === 'string' ? body.clientId : ''
    const clientSecret = typeof body.clientSecret === 'string' ? body.clientSecret : ''
    await oauth.saveCredentials(clientId, clientSecret)
    sendResult(req, res, { status: 'success', message: 'Credentials saved', redirectTo: '/settings' })
  } catch (err) {
    sendError(req, res, err, '/settings')
  }
}
