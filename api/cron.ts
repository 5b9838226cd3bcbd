import type { VercelRequest, VercelResponse } from '@vercel/node'
import { runScheduledTasks } from '@application/jobs/runScheduledTasks.ts'
import { taskGateway } from '@infrastructure/appContext.ts'
import { getContext } from './_lib/context.ts'
import { allowMethods, sendError } from './_lib/respond.ts'

/** Trigger for a platform scheduler; the CLI entry point runs the same job */
export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET', 'POST'])) return

  const ctx = getContext()
  const secret = ctx.config.cronSecret
  if (!secret) {
    return res.status(500).json({ status: 'error', message: 'CRON_SECRET not configured' })
  }
  if (req.headers.authorization !== `Bearer ${secret}`) {
    return res.status(401).json({ status: 'error', message: 'Unauthorized' })
  }

  try {
    const report = await runScheduledTasks({
      items: ctx.items,
      mappings: ctx.mappings,
      settings: ctx.settings,
      tasks: taskGateway(ctx),
      staleAfterDays: ctx.config.staleAfterDays,
    })
    return res.status(200).json({
      status: report.sync && report.sync.errors.length > 0 ? 'partial' : 'success',
      message: report.sync ? `Synced ${report.sync.synced} items` : 'Sync skipped: task list not connected',
      sync: report.sync,
      staleItems: report.stale.map(({ item, daysSinceCheck }) => ({
        id: item.id,
        name: item.name,
        category: item.category,
        daysSinceCheck,
      })),
    })
  } catch (err) {
    sendError(req, res, err, '/')
  }
}
