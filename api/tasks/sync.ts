import type { VercelRequest, VercelResponse } from '@vercel/node'
import { syncLowStockItems } from '@application/sync/syncLowStockItems.ts'
import { taskGateway } from '@infrastructure/appContext.ts'
import { createLogger } from '@infrastructure/log.ts'
import { getContext } from '../_lib/context.ts'
import { allowMethods, sendError, sendResult } from '../_lib/respond.ts'

const log = createLogger('sync')

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return

  try {
    const ctx = getContext()
    const result = await syncLowStockItems({
      items: ctx.items,
      mappings: ctx.mappings,
      settings: ctx.settings,
      tasks: taskGateway(ctx),
      logger: log,
    })
    const data = { synced: result.synced, skipped: result.skipped, errors: result.errors }

    if (result.errors.length > 0) {
      log.error(`Errors during sync:\n${result.errors.join('\n')}`)
      return sendResult(req, res, {
        status: result.synced > 0 ? 'partial' : 'error',
        message: `Synced ${result.synced} items with errors: ${result.errors.join('; ')}`,
        data,
        redirectTo: '/',
        httpStatus: 200,
      })
    }

    sendResult(req, res, {
      status: 'success',
      message: `Synced ${result.synced} items to Google Tasks`,
      data,
      redirectTo: '/',
    })
  } catch (err) {
    sendError(req, res, err, '/')
  }
}
