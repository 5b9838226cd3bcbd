import type { VercelRequest, VercelResponse } from '@vercel/node'
import { saveMapping } from '@application/settings/taskListSettings.ts'
import { getContext } from '../../_lib/context.ts'
import { readBody } from '../../_lib/request.ts'
import { allowMethods, sendError, sendResult } from '../../_lib/respond.ts'

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET', 'POST'])) return

  try {
    const ctx = getContext()

    if (req.method === 'GET') {
      return res.status(200).json({ status: 'success', mappings: await ctx.mappings.list() })
    }

    const mapping = await saveMapping(ctx.mappings, readBody(req))
    sendResult(req, res, {
      status: 'success',
      message: `Mapping for ${mapping.category} updated`,
      data: { mapping },
      redirectTo: '/settings',
    })
  } catch (err) {
    sendError(req, res, err, '/settings')
  }
}
