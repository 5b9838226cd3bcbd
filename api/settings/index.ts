import type { VercelRequest, VercelResponse } from '@vercel/node'
import type { TaskList } from '@domain/models/TaskList.ts'
import { errorMessage } from '@domain/errors.ts'
import { getDefaultTaskList } from '@application/settings/taskListSettings.ts'
import { createLogger } from '@infrastructure/log.ts'
import { getContext } from '../_lib/context.ts'
import { allowMethods, sendError } from '../_lib/respond.ts'

const log = createLogger('settings')

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['GET'])) return

  try {
    const ctx = getContext()
    const configured = ctx.oauth ? await ctx.oauth.isConfigured() : false
    const authenticated = ctx.tasks ? await ctx.tasks.isAuthenticated() : false

    let tasklists: TaskList[] = []
    let error: string | null = ctx.oauth ? null : 'SETTINGS_SECRET is not set; the task list integration is disabled'
    if (ctx.tasks && authenticated) {
      try {
        tasklists = await ctx.tasks.listTaskLists()
      } catch (err) {
        log.error('Could not fetch task lists:', errorMessage(err))
        error = `Could not fetch task lists: ${errorMessage(err)}`
      }
    }

    return res.status(200).json({
      status: 'success',
      configured,
      authenticated,
      error,
      defaultTasklist: await getDefaultTaskList(ctx.settings),
      mappings: await ctx.mappings.list(),
      categories: await ctx.items.listCategories(),
      tasklists,
    })
  } catch (err) {
    sendError(req, res, err, '/settings')
  }
}
