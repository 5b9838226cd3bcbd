import type { VercelRequest, VercelResponse } from '@vercel/node'
import { addItem, listInventory } from '@application/inventory/manageItems.ts'
import { toItemView } from '@application/inventory/itemView.ts'
import { getContext } from '../_lib/context.ts'
import { queryParam, readBody } from '../_lib/request.ts'
import { allowMethods, sendError, sendResult } from '../_lib/respond.ts'

function toNumber(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : Number(raw)
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET', 'POST'])) return

  try {
    const ctx = getContext()

    if (req.method === 'GET') {
      const page = await listInventory(ctx.items, {
        page: toNumber(queryParam(req, 'page')),
        pageSize: toNumber(queryParam(req, 'pageSize')) ?? ctx.config.pageSize,
      })
      return res.status(200).json({ status: 'success', ...page })
    }

    const item = await addItem(ctx.items, readBody(req))
    sendResult(req, res, {
      status: 'success',
      message: `Item ${item.name} added`,
      data: { item: toItemView(item) },
      redirectTo: '/',
      httpStatus: 201,
    })
  } catch (err) {
    sendError(req, res, err, '/')
  }
}
